import { CalendarDate } from "@shared/calendar-date";
import type { Actor, Expense, Project } from "@shared/models";
import { expenseDecisionRequestSchema, submitExpenseRequestSchema } from "@shared/schema";
import type { IStorage } from "../storage";
import {
  findDepartmentSummary,
  isPhaseInTimeline,
  normalizeDepartmentKey,
  type DepartmentBudgetSummary,
  type PhaseBudgetSummary,
} from "./budget-aggregator";
import { PROJECT_UPDATED, type ChangeNotifier } from "./change-notifier";
import type { Clock } from "./clock";
import { ServiceError } from "./errors";
import { evaluateEscalation, type EscalationDecision } from "./escalation-evaluator";
import type { ReconciliationDriver } from "./reconciliation-driver";
import { canApproveExpenses } from "./temp-approver-state";

export interface ExpensePreview {
  phase: PhaseBudgetSummary;
  department: DepartmentBudgetSummary | null;
  decision: EscalationDecision;
}

export interface SubmittedExpense {
  expense: Expense;
  decision: EscalationDecision;
}

interface ValidatedSubmission {
  project: Project;
  preview: ExpensePreview;
  departmentKey: string;
  date: CalendarDate;
  amount: number;
  description: string | null;
}

export class ExpenseService {
  constructor(
    private readonly storage: IStorage,
    private readonly reconciler: ReconciliationDriver,
    private readonly notifier: ChangeNotifier,
    private readonly clock: Clock,
  ) {}

  /** Escalation outcome for a candidate expense, without storing anything. */
  async previewExpense(projectId: string, body: unknown): Promise<ExpensePreview> {
    const submission = await this.validateSubmission(projectId, body);
    return submission.preview;
  }

  async submitExpense(projectId: string, actor: Actor, body: unknown): Promise<SubmittedExpense> {
    const submission = await this.validateSubmission(projectId, body);
    const { project, preview } = submission;

    const isMember = project.teamMembers.includes(actor.id) || project.managerIds.includes(actor.id);
    if (!isMember && !actor.isAdmin) {
      throw ServiceError.forbidden("Only project members can submit expenses");
    }

    // isAdmin is fixed here and never recomputed when budgets change later
    const expense = await this.storage.createExpense({
      projectId: project.id,
      phaseId: preview.phase.phaseId,
      phaseName: preview.phase.phaseName,
      department: submission.departmentKey,
      date: submission.date,
      amount: submission.amount,
      description: submission.description,
      isAdmin: preview.decision.isAdmin,
      submittedBy: actor.id,
    });

    console.log(`[EXPENSE] ${expense.id} submitted on project ${project.id} (isAdmin=${expense.isAdmin})`);
    this.notifier.emitChangeNotification(PROJECT_UPDATED, project.id, this.clock.now());
    return { expense, decision: preview.decision };
  }

  async approveExpense(expenseId: string, actor: Actor, body: unknown): Promise<Expense> {
    return await this.decide(expenseId, actor, body, 'approved');
  }

  async rejectExpense(expenseId: string, actor: Actor, body: unknown): Promise<Expense> {
    return await this.decide(expenseId, actor, body, 'rejected');
  }

  private async decide(expenseId: string, actor: Actor, body: unknown, status: 'approved' | 'rejected'): Promise<Expense> {
    const { remark } = expenseDecisionRequestSchema.parse(body ?? {});

    const expense = await this.storage.getExpense(expenseId);
    if (!expense) throw ServiceError.notFound("Expense not found");
    if (expense.status !== 'pending') {
      throw ServiceError.conflict(`Expense has already been ${expense.status}`);
    }

    const project = await this.storage.getProject(expense.projectId);
    if (!project) throw ServiceError.notFound("Project not found");

    const now = this.clock.now();
    const delegation = project.tempApproverId
      ? await this.storage.getTempApprover(project.id, project.tempApproverId)
      : undefined;

    const isApprover = canApproveExpenses(project, actor.id, delegation, now);
    if (expense.isAdmin ? !actor.isAdmin : !(isApprover || actor.isAdmin)) {
      throw ServiceError.forbidden(
        expense.isAdmin
          ? "This expense exceeds the budget and must be decided by an admin"
          : "You are not allowed to decide expenses for this project",
      );
    }

    const decided = await this.storage.decideExpense(expenseId, {
      status,
      decidedBy: actor.id,
      remark: remark ?? null,
      timestamp: now,
    });
    if (!decided) {
      throw ServiceError.conflict("Expense was decided by someone else");
    }

    const delegated = isApprover && project.managerIds[0] !== actor.id;
    if (status === 'approved' && delegated) {
      await this.storage.recordDelegatedApproval(project.id, actor.id, expenseId);
    }

    console.log(`[EXPENSE] ${expenseId} ${status} by ${actor.id}${delegated ? ' (delegated)' : ''}`);
    this.notifier.emitChangeNotification(PROJECT_UPDATED, project.id, now);
    return decided;
  }

  private async validateSubmission(projectId: string, body: unknown): Promise<ValidatedSubmission> {
    const request = submitExpenseRequestSchema.parse(body);

    const project = await this.storage.getProject(projectId);
    if (!project) throw ServiceError.notFound("Project not found");

    const { report } = await this.reconciler.loadPhaseBudgets(projectId);
    const phase = report.phases.find(summary => summary.phaseId === request.phaseId);
    if (!phase) throw ServiceError.badRequest("Phase not found on this project");
    if (!phase.isEnabled) throw ServiceError.badRequest("Expenses cannot be submitted against a disabled phase");

    const date = CalendarDate.parse(request.date);
    if (!date) throw ServiceError.badRequest("Expense date must be a dd/MM/yyyy date");
    if (!isPhaseInTimeline(phase, date)) {
      throw ServiceError.badRequest("Expense date must fall within the phase timeline");
    }

    const department = findDepartmentSummary(phase, request.department);
    if (!department && !phase.degraded) {
      throw ServiceError.badRequest(`Department "${request.department}" does not exist in ${phase.phaseName}`);
    }

    return {
      project,
      preview: {
        phase,
        department: department ?? null,
        decision: evaluateEscalation(request.amount, phase, department),
      },
      departmentKey: department?.key ?? normalizeDepartmentKey(phase.phaseId, request.department),
      date,
      amount: request.amount,
      description: request.description || null,
    };
  }
}
