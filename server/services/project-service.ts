import { CalendarDate } from "@shared/calendar-date";
import type { Actor, Project } from "@shared/models";
import { insertProjectSchema, suspendProjectRequestSchema } from "@shared/schema";
import type { IStorage } from "../storage";
import { PROJECT_UPDATED, type ChangeNotifier } from "./change-notifier";
import { today, type Clock } from "./clock";
import { ServiceError } from "./errors";
import { isClosedStatus, resumeStatus, sortProjectsForDisplay } from "./project-status";
import type { PhaseBudgetLoad, ReconciliationDriver } from "./reconciliation-driver";

/** Read paths reconcile what they return before returning it. */
export class ProjectService {
  constructor(
    private readonly storage: IStorage,
    private readonly reconciler: ReconciliationDriver,
    private readonly notifier: ChangeNotifier,
    private readonly clock: Clock,
  ) {}

  async listProjects(): Promise<Project[]> {
    const projects = await this.storage.getProjects();
    const results = await this.reconciler.reconcileProjects(projects);

    const refreshed = results.some(result => result.changed)
      ? await this.storage.getProjects()
      : projects;
    return sortProjectsForDisplay(refreshed);
  }

  async getProject(projectId: string): Promise<Project> {
    const project = await this.requireProject(projectId);

    const result = await this.reconciler.reconcileProject(project);
    if (!result.changed) return project;

    return await this.requireProject(projectId);
  }

  async getPhaseReport(projectId: string): Promise<PhaseBudgetLoad & { project: Project }> {
    const project = await this.getProject(projectId);
    const load = await this.reconciler.loadPhaseBudgets(projectId);
    return { project, ...load };
  }

  async createProject(body: unknown): Promise<Project> {
    const request = insertProjectSchema.parse(body);
    const project = await this.storage.createProject(request);
    console.log(`[PROJECT] Created ${project.id} "${project.name}"`);
    this.notifier.emitChangeNotification(PROJECT_UPDATED, project.id, this.clock.now());
    return project;
  }

  /**
   * Admin only. With `suspendedUntil` the suspension lifts on the first pass
   * after that day; without it the project stays suspended until resumed.
   */
  async suspendProject(projectId: string, actor: Actor, body: unknown): Promise<Project> {
    const request = suspendProjectRequestSchema.parse(body);
    if (!actor.isAdmin) throw ServiceError.forbidden("Only an administrator can suspend a project");

    const project = await this.requireProject(projectId);
    if (isClosedStatus(project.status)) {
      throw ServiceError.conflict(`Project is ${project.status} and cannot be suspended`);
    }

    const suspendedDate = CalendarDate.parse(request.suspendedUntil);
    if (request.suspendedUntil && !suspendedDate) {
      throw ServiceError.badRequest("Suspension end date is not a valid date");
    }
    if (suspendedDate && suspendedDate.isBefore(today(this.clock))) {
      throw ServiceError.badRequest("Suspension end date cannot be in the past");
    }

    const now = this.clock.now();
    const suspended = await this.storage.suspendProject(project.id, { suspendedDate, reason: request.reason }, now);
    if (!suspended) throw ServiceError.conflict("Project is already suspended");

    console.log(`[PROJECT] Suspended ${project.id} until ${suspendedDate?.format() ?? 'resumed'}: ${request.reason}`);
    this.notifier.emitChangeNotification(PROJECT_UPDATED, project.id, now);
    return await this.requireProject(project.id);
  }

  async resumeProject(projectId: string, actor: Actor): Promise<Project> {
    if (!actor.isAdmin) throw ServiceError.forbidden("Only an administrator can resume a project");

    const project = await this.requireProject(projectId);

    const now = this.clock.now();
    const status = resumeStatus(project.plannedDate, today(this.clock));
    const resumed = await this.storage.unsuspendProject(project.id, status, now);
    if (!resumed) throw ServiceError.conflict("Project is not suspended");

    console.log(`[PROJECT] Resumed ${project.id} → ${status}`);
    this.notifier.emitChangeNotification(PROJECT_UPDATED, project.id, now);
    return await this.getProject(project.id);
  }

  private async requireProject(projectId: string): Promise<Project> {
    const project = await this.storage.getProject(projectId);
    if (!project) throw ServiceError.notFound("Project not found");
    return project;
  }
}
