import type { Actor, Department, Phase, PhaseRequest, PhaseTimelineChange, Project } from "@shared/models";
import { CalendarDate } from "@shared/calendar-date";
import {
  insertDepartmentRequestSchema,
  insertPhaseRequestSchema,
  phaseExtensionRequestSchema,
  phaseRequestDecisionSchema,
  phaseRequestStatusEnum,
  updatePhaseRequestSchema,
} from "@shared/schema";
import type { IStorage } from "../storage";
import { PROJECT_UPDATED, type ChangeNotifier } from "./change-notifier";
import type { Clock } from "./clock";
import { ServiceError } from "./errors";
import { deriveHandoverDates } from "./project-status";

function sameDate(a: CalendarDate | null, b: CalendarDate | null): boolean {
  if (!a || !b) return a === b;
  return a.equals(b);
}

function parseDate(value: string | null | undefined, label: string): CalendarDate | null {
  if (!value) return null;
  const parsed = CalendarDate.parse(value);
  if (!parsed) throw ServiceError.badRequest(`${label} is not a valid date`);
  return parsed;
}

function assertTimeline(startDate: CalendarDate | null, endDate: CalendarDate | null) {
  if (startDate && endDate && endDate.isBefore(startDate)) {
    throw ServiceError.badRequest("Phase end date cannot be before its start date");
  }
}

function requirePhase(phases: readonly Phase[], phaseId: string): Phase {
  const phase = phases.find(candidate => candidate.id === phaseId);
  if (!phase) throw ServiceError.notFound("Phase not found");
  return phase;
}

function replacePhase(phases: readonly Phase[], updated: Phase): Phase[] {
  return phases.map(phase => (phase.id === updated.id ? updated : phase));
}

export class PhaseService {
  constructor(
    private readonly storage: IStorage,
    private readonly notifier: ChangeNotifier,
    private readonly clock: Clock,
  ) {}

  async createPhase(projectId: string, actor: Actor, body: unknown): Promise<Phase> {
    const request = insertPhaseRequestSchema.parse(body);
    const project = await this.requireManagedProject(projectId, actor);

    const startDate = parseDate(request.startDate, "Start date");
    const endDate = parseDate(request.endDate, "End date");
    assertTimeline(startDate, endDate);

    const existing = await this.storage.listPhases(project.id);
    const nextNumber = existing.reduce((max, phase) => Math.max(max, phase.phaseNumber), 0) + 1;
    const phase = await this.storage.createPhase(project.id, request, nextNumber);

    console.log(`[PHASE] Created phase ${nextNumber} "${phase.phaseName}" on project ${project.id}`);
    await this.refreshHandover(project, [...existing, phase]);
    this.notifier.emitChangeNotification(PROJECT_UPDATED, project.id, this.clock.now());
    return phase;
  }

  /** Remaining phases are renumbered 1..n in their previous order. */
  async deletePhase(projectId: string, phaseId: string, actor: Actor): Promise<void> {
    const project = await this.requireManagedProject(projectId, actor);

    const deleted = await this.storage.deletePhase(project.id, phaseId);
    if (!deleted) throw ServiceError.notFound("Phase not found");

    const remaining = await this.storage.listPhases(project.id);
    await this.storage.renumberPhases(project.id, remaining.map(phase => phase.id));

    console.log(`[PHASE] Deleted phase ${phaseId} from project ${project.id}; ${remaining.length} remaining`);
    await this.refreshHandover(project, remaining);
    this.notifier.emitChangeNotification(PROJECT_UPDATED, project.id, this.clock.now());
  }

  async createDepartment(projectId: string, phaseId: string, actor: Actor, body: unknown): Promise<Department> {
    const request = insertDepartmentRequestSchema.parse(body);
    const project = await this.requireManagedProject(projectId, actor);

    requirePhase(await this.storage.listPhases(project.id), phaseId);

    const existing = await this.storage.listDepartments(project.id, phaseId);
    const name = request.name.toLowerCase();
    if (existing.some(department => department.name.toLowerCase() === name)) {
      throw ServiceError.conflict(`Department "${request.name}" already exists in this phase`);
    }

    const department = await this.storage.createDepartment(project.id, phaseId, request);
    console.log(`[PHASE] Added department "${department.name}" to phase ${phaseId}`);
    this.notifier.emitChangeNotification(PROJECT_UPDATED, project.id, this.clock.now());
    return department;
  }

  /**
   * Renames, re-dates or enables/disables a phase. A change to either date is
   * logged to the phase's timeline history in the same write.
   */
  async updatePhase(projectId: string, phaseId: string, actor: Actor, body: unknown): Promise<Phase> {
    const request = updatePhaseRequestSchema.parse(body);
    const project = await this.requireManagedProject(projectId, actor);
    const phases = await this.storage.listPhases(project.id);
    const phase = requirePhase(phases, phaseId);

    const startDate = request.startDate === undefined ? phase.startDate : parseDate(request.startDate, "Start date");
    const endDate = request.endDate === undefined ? phase.endDate : parseDate(request.endDate, "End date");
    assertTimeline(startDate, endDate);

    const timelineChanged = !sameDate(startDate, phase.startDate) || !sameDate(endDate, phase.endDate);
    const updated = await this.storage.updatePhase(
      project.id,
      phase.id,
      { phaseName: request.phaseName, startDate, endDate, isEnabled: request.isEnabled },
      timelineChanged
        ? {
          previousStartDate: phase.startDate,
          previousEndDate: phase.endDate,
          newStartDate: startDate,
          newEndDate: endDate,
          changedBy: actor.id,
          requestId: null,
        }
        : null,
      this.clock.now(),
    );
    if (!updated) throw ServiceError.notFound("Phase not found");

    console.log(`[PHASE] Updated phase ${updated.phaseNumber} "${updated.phaseName}" on project ${project.id}`);
    await this.refreshHandover(project, replacePhase(phases, updated));
    this.notifier.emitChangeNotification(PROJECT_UPDATED, project.id, this.clock.now());
    return updated;
  }

  async listTimelineChanges(projectId: string, phaseId: string): Promise<PhaseTimelineChange[]> {
    const project = await this.storage.getProject(projectId);
    if (!project) throw ServiceError.notFound("Project not found");
    return await this.storage.listTimelineChanges(project.id, phaseId);
  }

  /** Any member of the project team may ask for a later phase end date. */
  async requestExtension(projectId: string, phaseId: string, actor: Actor, body: unknown): Promise<PhaseRequest> {
    const request = phaseExtensionRequestSchema.parse(body);
    const project = await this.storage.getProject(projectId);
    if (!project) throw ServiceError.notFound("Project not found");

    const onTeam = project.teamMembers.includes(actor.id) || project.managerIds.includes(actor.id);
    if (!onTeam && !actor.isAdmin) {
      throw ServiceError.forbidden("Only project team members can request a phase extension");
    }

    const phase = requirePhase(await this.storage.listPhases(project.id), phaseId);
    const extendedDate = parseDate(request.extendedDate, "Extension date");
    if (!extendedDate) throw ServiceError.badRequest("Extension date is required");
    if (!phase.endDate) throw ServiceError.badRequest("Phase has no end date to extend");
    if (!extendedDate.isAfter(phase.endDate)) {
      throw ServiceError.badRequest("Extension date must be after the current phase end date");
    }

    const created = await this.storage.createPhaseRequest({
      projectId: project.id,
      phaseId: phase.id,
      requestedBy: actor.id,
      reason: request.reason,
      extendedDate,
    });
    console.log(`[PHASE] ${actor.id} requested extending phase ${phase.id} to ${extendedDate.format()}`);
    this.notifier.emitChangeNotification(PROJECT_UPDATED, project.id, this.clock.now());
    return created;
  }

  async listPhaseRequests(projectId: string, status?: unknown): Promise<PhaseRequest[]> {
    const filter = phaseRequestStatusEnum.optional().parse(status);
    const project = await this.storage.getProject(projectId);
    if (!project) throw ServiceError.notFound("Project not found");
    return await this.storage.listPhaseRequests(project.id, filter);
  }

  /** Moves the phase end date to the requested day and logs the change against the request. */
  async acceptPhaseRequest(requestId: string, actor: Actor, body: unknown): Promise<PhaseRequest> {
    return await this.decidePhaseRequest(requestId, actor, body, 'ACCEPTED');
  }

  async rejectPhaseRequest(requestId: string, actor: Actor, body: unknown): Promise<PhaseRequest> {
    return await this.decidePhaseRequest(requestId, actor, body, 'REJECTED');
  }

  private async decidePhaseRequest(
    requestId: string,
    actor: Actor,
    body: unknown,
    status: 'ACCEPTED' | 'REJECTED',
  ): Promise<PhaseRequest> {
    const { remark } = phaseRequestDecisionSchema.parse(body ?? {});
    const request = await this.storage.getPhaseRequest(requestId);
    if (!request) throw ServiceError.notFound("Phase request not found");
    if (request.status !== 'PENDING') {
      throw ServiceError.conflict(`Phase request has already been ${request.status.toLowerCase()}`);
    }

    const project = await this.requireManagedProject(request.projectId, actor);
    const phases = await this.storage.listPhases(project.id);
    const phase = requirePhase(phases, request.phaseId);
    const extendedDate = request.extendedDate;
    if (status === 'ACCEPTED' && !extendedDate) {
      throw ServiceError.badRequest("Phase request has no valid extension date");
    }

    const now = this.clock.now();
    const decided = await this.storage.decidePhaseRequest(request.id, {
      status,
      decidedBy: actor.id,
      reasonToReact: remark || null,
      timestamp: now,
    });
    if (!decided) throw ServiceError.conflict("Phase request changed while it was being decided");

    if (status === 'ACCEPTED' && extendedDate) {
      const updated = await this.storage.updatePhase(
        project.id,
        phase.id,
        { endDate: extendedDate },
        {
          previousStartDate: phase.startDate,
          previousEndDate: phase.endDate,
          newStartDate: phase.startDate,
          newEndDate: extendedDate,
          changedBy: actor.id,
          requestId: request.id,
        },
        now,
      );
      if (!updated) throw ServiceError.notFound("Phase not found");
      await this.refreshHandover(project, replacePhase(phases, updated));
    }

    console.log(`[PHASE] Extension request ${request.id} ${status.toLowerCase()} by ${actor.id}`);
    this.notifier.emitChangeNotification(PROJECT_UPDATED, project.id, now);
    return decided;
  }

  private async refreshHandover(project: Project, phases: readonly Phase[]) {
    const dates = deriveHandoverDates(project, phases.map(phase => phase.endDate));
    if (
      sameDate(dates.handoverDate, project.handoverDate) &&
      sameDate(dates.initialHandoverDate, project.initialHandoverDate)
    ) {
      return;
    }
    await this.storage.updateProjectHandover(project.id, dates, this.clock.now());
  }

  private async requireManagedProject(projectId: string, actor: Actor): Promise<Project> {
    const project = await this.storage.getProject(projectId);
    if (!project) throw ServiceError.notFound("Project not found");
    if (project.managerIds[0] !== actor.id && !actor.isAdmin) {
      throw ServiceError.forbidden("Only the project manager can change phases");
    }
    return project;
  }
}
