import type { Phase, Project, TempApprover } from "@shared/models";
import type { IStorage } from "../storage";
import {
  aggregateProjectBudget,
  hasActivePhase,
  type PhaseBudgetInput,
  type ProjectBudgetReport,
} from "./budget-aggregator";
import { PROJECT_UPDATED, type ChangeNotifier } from "./change-notifier";
import { systemClock, today, type Clock } from "./clock";
import { CalendarDate } from "@shared/calendar-date";
import { describeError, type ReconciliationEvent } from "./errors";
import { deriveStatusTransition, deriveUnsuspension, isPhaseDrivenStatus } from "./project-status";
import { currentStatus, needsStatusUpdate } from "./temp-approver-state";

export interface ReconciliationResult {
  projectId: string;
  events: ReconciliationEvent[];
  /** At least one write went through. */
  changed: boolean;
}

export interface PhaseBudgetLoad {
  phases: Phase[];
  report: ProjectBudgetReport;
  events: ReconciliationEvent[];
}

function logEvent(event: ReconciliationEvent) {
  switch (event.kind) {
    case 'transient-read-failure':
      console.error(`[RECONCILE] Read failed (${event.operation}) for project ${event.projectId}: ${event.message}`);
      break;
    case 'write-failure':
      console.error(`[RECONCILE] Write failed (${event.operation}) for project ${event.projectId}: ${event.message}`);
      break;
    case 'degraded-data':
      console.warn(`[RECONCILE] Project ${event.projectId} using legacy phase budgets for: ${event.phaseIds.join(', ')}`);
      break;
    case 'inconsistent-reference':
      console.warn(`[RECONCILE] Project ${event.projectId} has an inconsistent ${event.reference}: ${event.detail}`);
      break;
    case 'state-conflict':
      console.warn(`[RECONCILE] Skipped ${event.operation} for project ${event.projectId}: stored state no longer ${event.expected}`);
      break;
    case 'status-changed':
      console.log(`[RECONCILE] Project ${event.projectId} ${event.from} → ${event.to} (${event.reason})`);
      break;
    case 'unsuspended':
      console.log(`[RECONCILE] Project ${event.projectId} unsuspended → ${event.to}`);
      break;
    case 'delegation-updated':
      console.log(`[RECONCILE] Delegation ${event.approverId} on project ${event.projectId} ${event.from} → ${event.to}`);
      break;
    case 'delegation-cleared':
      console.log(`[RECONCILE] Cleared delegation ${event.approverId} from project ${event.projectId}`);
      break;
  }
}

/**
 * Compares derived project state against what the store holds and writes the
 * difference back. Runs when projects are read, never on a timer.
 */
export class ReconciliationDriver {
  constructor(
    private readonly storage: IStorage,
    private readonly notifier: ChangeNotifier,
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * Phases, approved expenses and per-phase departments for one project,
   * aggregated as of today. A failed department load degrades only its phase;
   * a failed phase or expense read rejects.
   */
  async loadPhaseBudgets(projectId: string): Promise<PhaseBudgetLoad> {
    const day = today(this.clock);
    const events: ReconciliationEvent[] = [];

    const [phases, approvedExpenses] = await Promise.all([
      this.storage.listPhases(projectId),
      this.storage.listApprovedExpenses(projectId),
    ]);

    const settled = await Promise.allSettled(
      phases.map(phase => this.storage.listDepartments(projectId, phase.id)),
    );

    const inputs: PhaseBudgetInput[] = phases.map((phase, index) => {
      const result = settled[index];
      if (result.status === 'fulfilled') {
        return { phase, departments: result.value };
      }
      this.record(events, {
        kind: 'transient-read-failure',
        projectId,
        operation: `listDepartments(${phase.id})`,
        message: describeError(result.reason),
      });
      return { phase, departments: null };
    });

    const report = aggregateProjectBudget({ projectId, phases: inputs, approvedExpenses, today: day });

    if (report.degradedPhaseIds.length > 0) {
      this.record(events, { kind: 'degraded-data', projectId, phaseIds: report.degradedPhaseIds });
    }
    for (const expenseId of report.unattributedExpenseIds) {
      this.record(events, {
        kind: 'inconsistent-reference',
        projectId,
        reference: 'expense',
        detail: `approved expense ${expenseId} matches no phase or department`,
      });
    }

    return { phases, report, events };
  }

  /**
   * One reconciliation pass. Never rejects; failures come back as events.
   * A lifted suspension is followed by the status and delegation passes over
   * the project as just written, and the pass notifies at most once.
   */
  async reconcileProject(project: Project): Promise<ReconciliationResult> {
    const result: ReconciliationResult = { projectId: project.id, events: [], changed: false };
    const now = this.clock.now();
    const day = CalendarDate.fromDate(now);

    let current = project;
    const unsuspension = deriveUnsuspension(project, day);
    if (unsuspension) {
      const written = await this.attemptWrite(result, 'unsuspendProject', () =>
        this.storage.unsuspendProject(project.id, unsuspension.to, now));
      if (!written) {
        if (written === false) {
          this.record(result.events, {
            kind: 'state-conflict',
            projectId: project.id,
            operation: 'unsuspendProject',
            expected: 'suspended',
          });
        }
        return result;
      }

      this.record(result.events, { kind: 'unsuspended', projectId: project.id, to: unsuspension.to });
      result.changed = true;
      current = {
        ...project,
        status: unsuspension.to,
        storedStatus: unsuspension.to,
        isSuspended: false,
        suspendedDate: null,
        suspensionReason: null,
        updatedAt: now,
      };
    }

    await this.reconcileStatus(current, now, day, result);
    await this.reconcileDelegation(current, now, result);

    if (result.changed) {
      this.notifier.emitChangeNotification(PROJECT_UPDATED, project.id, now);
    }
    return result;
  }

  async reconcileProjects(projects: readonly Project[]): Promise<ReconciliationResult[]> {
    return await Promise.all(projects.map(project => this.reconcileProject(project)));
  }

  private async reconcileStatus(project: Project, now: Date, day: CalendarDate, result: ReconciliationResult) {
    if (project.isSuspended || !isPhaseDrivenStatus(project.status)) return;

    let phases: Phase[];
    try {
      phases = await this.storage.listPhases(project.id);
    } catch (error) {
      this.record(result.events, {
        kind: 'transient-read-failure',
        projectId: project.id,
        operation: 'listPhases',
        message: describeError(error),
      });
      return;
    }

    const transition = deriveStatusTransition({
      status: project.status,
      isSuspended: project.isSuspended,
      hasActivePhase: hasActivePhase(phases, day),
      handoverDate: project.handoverDate,
      today: day,
    });
    if (!transition) return;

    const written = await this.attemptWrite(result, 'updateProjectStatus', () =>
      this.storage.updateProjectStatus(project.id, project.storedStatus, transition.to, now));
    if (written) {
      this.record(result.events, { kind: 'status-changed', projectId: project.id, ...transition });
      result.changed = true;
    } else if (written === false) {
      this.record(result.events, {
        kind: 'state-conflict',
        projectId: project.id,
        operation: 'updateProjectStatus',
        expected: project.storedStatus,
      });
    }
  }

  private async reconcileDelegation(project: Project, now: Date, result: ReconciliationResult) {
    const approverId = project.tempApproverId;
    if (!approverId) return;

    let delegation: TempApprover | undefined;
    try {
      delegation = await this.storage.getTempApprover(project.id, approverId);
    } catch (error) {
      this.record(result.events, {
        kind: 'transient-read-failure',
        projectId: project.id,
        operation: 'getTempApprover',
        message: describeError(error),
      });
      return;
    }

    if (!delegation) {
      this.record(result.events, {
        kind: 'inconsistent-reference',
        projectId: project.id,
        reference: 'tempApproverId',
        detail: `no delegation record for ${approverId}`,
      });
      return;
    }

    const observed = currentStatus(delegation, now);
    const storedStatus = delegation.status;

    if (needsStatusUpdate(delegation, now)) {
      const written = await this.attemptWrite(result, 'updateTempApproverStatus', () =>
        this.storage.updateTempApproverStatus(project.id, approverId, storedStatus, observed));
      if (written === undefined) return;
      if (!written) {
        // Accepted, rejected or replaced since it was read
        this.record(result.events, {
          kind: 'state-conflict',
          projectId: project.id,
          operation: 'updateTempApproverStatus',
          expected: storedStatus,
        });
        return;
      }
      this.record(result.events, {
        kind: 'delegation-updated',
        projectId: project.id,
        approverId,
        from: storedStatus,
        to: observed,
      });
      result.changed = true;
    }

    if (observed === 'expired' || observed === 'rejected') {
      const cleared = await this.attemptWrite(result, 'clearTempApproverAssignment', () =>
        this.storage.clearTempApproverAssignment(project.id, approverId));
      if (cleared) {
        this.record(result.events, { kind: 'delegation-cleared', projectId: project.id, approverId });
        result.changed = true;
      } else if (cleared === false) {
        this.record(result.events, {
          kind: 'state-conflict',
          projectId: project.id,
          operation: 'clearTempApproverAssignment',
          expected: approverId,
        });
      }
    }
  }

  /** Resolves to the write's outcome, or undefined when it threw. */
  private async attemptWrite(
    result: ReconciliationResult,
    operation: string,
    write: () => Promise<boolean>,
  ): Promise<boolean | undefined> {
    try {
      return await write();
    } catch (error) {
      this.record(result.events, {
        kind: 'write-failure',
        projectId: result.projectId,
        operation,
        message: describeError(error),
      });
      return undefined;
    }
  }

  private record(events: ReconciliationEvent[], event: ReconciliationEvent) {
    events.push(event);
    logEvent(event);
  }
}
