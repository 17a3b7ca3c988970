import type { Actor, Project, TempApprover } from "@shared/models";
import { assignTempApproverRequestSchema, rejectTempApproverRequestSchema } from "@shared/schema";
import type { IStorage } from "../storage";
import { PROJECT_UPDATED, type ChangeNotifier } from "./change-notifier";
import type { Clock } from "./clock";
import { ServiceError } from "./errors";
import {
  currentStatus,
  isLiveDelegation,
  statusOnAcceptance,
  validateDelegationWindow,
} from "./temp-approver-state";

export class TempApproverService {
  constructor(
    private readonly storage: IStorage,
    private readonly notifier: ChangeNotifier,
    private readonly clock: Clock,
  ) {}

  /** The project's manager (or an admin) hands approval authority to someone else for a bounded window. */
  async assign(projectId: string, actor: Actor, body: unknown): Promise<TempApprover> {
    const request = assignTempApproverRequestSchema.parse(body);
    const project = await this.requireProject(projectId);
    const now = this.clock.now();

    if (project.managerIds[0] !== actor.id && !actor.isAdmin) {
      throw ServiceError.forbidden("Only the project manager can assign a temporary approver");
    }
    if (project.managerIds[0] === request.approverId) {
      throw ServiceError.badRequest("The project manager cannot be their own temporary approver");
    }

    const validation = validateDelegationWindow(request.startDate, request.endDate, now);
    if (!validation.isValid) {
      throw ServiceError.badRequest(validation.errorMessage);
    }

    if (project.tempApproverId) {
      const existing = await this.storage.getTempApprover(project.id, project.tempApproverId);
      if (existing && isLiveDelegation(existing, now)) {
        throw ServiceError.conflict("This project already has a temporary approver");
      }
    }

    const delegation = await this.storage.createTempApprover(project.id, request.approverId, request.startDate, request.endDate);
    console.log(`[TEMP_APPROVER] ${request.approverId} assigned to project ${project.id} until ${request.endDate.toISOString()}`);
    this.notifier.emitChangeNotification(PROJECT_UPDATED, project.id, now);
    return delegation;
  }

  async accept(projectId: string, actor: Actor): Promise<TempApprover> {
    const { project, delegation } = await this.requireOwnDelegation(projectId, actor);
    const now = this.clock.now();

    const observed = currentStatus(delegation, now);
    if (observed !== 'pending') {
      throw ServiceError.conflict(`Delegation is ${observed} and can no longer be accepted`);
    }

    const status = statusOnAcceptance(delegation, now);
    const updated = await this.storage.updateTempApproverStatus(project.id, actor.id, delegation.status, status);
    if (!updated) throw ServiceError.conflict("Delegation changed while it was being accepted");

    console.log(`[TEMP_APPROVER] ${actor.id} accepted delegation on project ${project.id} (${status})`);
    this.notifier.emitChangeNotification(PROJECT_UPDATED, project.id, now);
    return { ...delegation, status };
  }

  async reject(projectId: string, actor: Actor, body: unknown): Promise<TempApprover> {
    const { reason } = rejectTempApproverRequestSchema.parse(body);
    const { project, delegation } = await this.requireOwnDelegation(projectId, actor);
    const now = this.clock.now();

    if (!isLiveDelegation(delegation, now)) {
      throw ServiceError.conflict(`Delegation is ${currentStatus(delegation, now)} and can no longer be rejected`);
    }

    const updated = await this.storage.updateTempApproverStatus(project.id, actor.id, delegation.status, 'rejected', reason);
    if (!updated) throw ServiceError.conflict("Delegation changed while it was being rejected");
    await this.storage.clearTempApproverAssignment(project.id, actor.id);

    console.log(`[TEMP_APPROVER] ${actor.id} rejected delegation on project ${project.id}`);
    this.notifier.emitChangeNotification(PROJECT_UPDATED, project.id, now);
    return { ...delegation, status: 'rejected', rejectionReason: reason };
  }

  private async requireProject(projectId: string): Promise<Project> {
    const project = await this.storage.getProject(projectId);
    if (!project) throw ServiceError.notFound("Project not found");
    return project;
  }

  private async requireOwnDelegation(projectId: string, actor: Actor): Promise<{ project: Project; delegation: TempApprover }> {
    const project = await this.requireProject(projectId);
    if (project.tempApproverId !== actor.id) {
      throw ServiceError.forbidden("You are not the temporary approver of this project");
    }

    const delegation = await this.storage.getTempApprover(project.id, actor.id);
    if (!delegation) throw ServiceError.notFound("Delegation not found");
    return { project, delegation };
  }
}
