import {
  projects, phases, departments, expenses, tempApprovers, phaseRequests, phaseTimelineChanges,
  type InsertProject, type InsertPhaseRequest, type InsertDepartmentRequest,
  type ProjectStatus, type TempApproverStatus, type PhaseRequestStatus,
} from "@shared/schema";
import type { CalendarDate } from "@shared/calendar-date";
import type {
  Department, Expense, Phase, PhaseRequest, PhaseTimelineChange, Project, TempApprover,
} from "@shared/models";
import { db } from "./db";
import { eq, desc, asc, and, sql } from "drizzle-orm";
import {
  toDateString, toDecimalString,
  toProject, toPhase, toDepartment, toExpense, toTempApprover,
  toPhaseRequest, toPhaseTimelineChange,
} from "./utils/storageMappers";

export interface NewExpense {
  projectId: string;
  phaseId: string;
  phaseName: string;
  department: string;
  date: CalendarDate;
  amount: number;
  description: string | null;
  isAdmin: boolean;
  submittedBy: string;
}

export interface ExpenseDecision {
  status: 'approved' | 'rejected';
  decidedBy: string;
  remark: string | null;
  timestamp: Date;
}

export interface HandoverDates {
  handoverDate: CalendarDate | null;
  initialHandoverDate: CalendarDate | null;
}

export interface ProjectSuspension {
  /** Suspended until this day inclusive; null until resumed by hand. */
  suspendedDate: CalendarDate | null;
  reason: string;
}

/** Omitted fields are left unchanged; a null date clears it. */
export interface PhaseUpdate {
  phaseName?: string;
  startDate?: CalendarDate | null;
  endDate?: CalendarDate | null;
  isEnabled?: boolean;
}

export interface NewTimelineChange {
  previousStartDate: CalendarDate | null;
  previousEndDate: CalendarDate | null;
  newStartDate: CalendarDate | null;
  newEndDate: CalendarDate | null;
  changedBy: string;
  requestId: string | null;
}

export interface NewPhaseRequest {
  projectId: string;
  phaseId: string;
  requestedBy: string;
  reason: string;
  extendedDate: CalendarDate;
}

export interface PhaseRequestDecision {
  status: 'ACCEPTED' | 'REJECTED';
  decidedBy: string;
  reasonToReact: string | null;
  timestamp: Date;
}

/**
 * Document-store style access to projects and their sub-entities.
 * Writes that correct derived state are conditional: they report `false`
 * instead of overwriting a row that changed since it was read.
 */
export interface IStorage {
  // Projects
  getProjects(): Promise<Project[]>;
  getProject(id: string): Promise<Project | undefined>;
  createProject(project: InsertProject): Promise<Project>;
  updateProjectStatus(projectId: string, expectedStatus: string, newStatus: ProjectStatus, timestamp: Date): Promise<boolean>;
  unsuspendProject(projectId: string, newStatus: ProjectStatus, timestamp: Date): Promise<boolean>;
  updateProjectHandover(projectId: string, dates: HandoverDates, timestamp: Date): Promise<void>;
  suspendProject(projectId: string, suspension: ProjectSuspension, timestamp: Date): Promise<boolean>;

  // Phases
  listPhases(projectId: string): Promise<Phase[]>;
  createPhase(projectId: string, phase: InsertPhaseRequest, phaseNumber: number): Promise<Phase>;
  deletePhase(projectId: string, phaseId: string): Promise<boolean>;
  renumberPhases(projectId: string, orderedPhaseIds: string[]): Promise<void>;
  /** Writes the phase and, when given, its timeline change log entry together. */
  updatePhase(
    projectId: string,
    phaseId: string,
    update: PhaseUpdate,
    timelineChange: NewTimelineChange | null,
    timestamp: Date,
  ): Promise<Phase | undefined>;
  listTimelineChanges(projectId: string, phaseId: string): Promise<PhaseTimelineChange[]>;

  // Phase extension requests
  createPhaseRequest(request: NewPhaseRequest): Promise<PhaseRequest>;
  getPhaseRequest(id: string): Promise<PhaseRequest | undefined>;
  listPhaseRequests(projectId: string, status?: PhaseRequestStatus): Promise<PhaseRequest[]>;
  /** Only a PENDING request can be decided. */
  decidePhaseRequest(id: string, decision: PhaseRequestDecision): Promise<PhaseRequest | undefined>;

  // Departments
  listDepartments(projectId: string, phaseId: string): Promise<Department[]>;
  createDepartment(projectId: string, phaseId: string, department: InsertDepartmentRequest): Promise<Department>;

  // Expenses
  listApprovedExpenses(projectId: string): Promise<Expense[]>;
  getExpense(id: string): Promise<Expense | undefined>;
  createExpense(expense: NewExpense): Promise<Expense>;
  decideExpense(id: string, decision: ExpenseDecision): Promise<Expense | undefined>;

  // Temporary approvers
  getTempApprover(projectId: string, approverId: string): Promise<TempApprover | undefined>;
  createTempApprover(projectId: string, approverId: string, startDate: Date, endDate: Date): Promise<TempApprover>;
  updateTempApproverStatus(
    projectId: string,
    approverId: string,
    expectedStatus: TempApproverStatus,
    newStatus: TempApproverStatus,
    reason?: string,
  ): Promise<boolean>;
  recordDelegatedApproval(projectId: string, approverId: string, expenseId: string): Promise<void>;
  clearTempApproverAssignment(projectId: string, expectedApproverId: string): Promise<boolean>;
}

export class DatabaseStorage implements IStorage {
  // Projects
  async getProjects(): Promise<Project[]> {
    const rows = await db.select().from(projects).orderBy(desc(projects.createdAt));
    return rows.map(toProject);
  }

  async getProject(id: string): Promise<Project | undefined> {
    const [row] = await db.select().from(projects).where(eq(projects.id, id));
    return row ? toProject(row) : undefined;
  }

  async createProject(insertProject: InsertProject): Promise<Project> {
    const [row] = await db.insert(projects).values({
      ...insertProject,
      status: 'IN_REVIEW',
      initialHandoverDate: insertProject.handoverDate ?? null,
    }).returning();
    return toProject(row);
  }

  async updateProjectStatus(projectId: string, expectedStatus: string, newStatus: ProjectStatus, timestamp: Date): Promise<boolean> {
    const updated = await db.update(projects)
      .set({ status: newStatus, updatedAt: timestamp })
      .where(and(
        eq(projects.id, projectId),
        eq(projects.status, expectedStatus),
        eq(projects.isSuspended, false),
      ))
      .returning({ id: projects.id });
    return updated.length > 0;
  }

  async unsuspendProject(projectId: string, newStatus: ProjectStatus, timestamp: Date): Promise<boolean> {
    const updated = await db.update(projects)
      .set({
        isSuspended: false,
        suspendedDate: null,
        suspensionReason: null,
        status: newStatus,
        updatedAt: timestamp,
      })
      .where(and(eq(projects.id, projectId), eq(projects.isSuspended, true)))
      .returning({ id: projects.id });
    return updated.length > 0;
  }

  async updateProjectHandover(projectId: string, dates: HandoverDates, timestamp: Date): Promise<void> {
    await db.update(projects)
      .set({
        handoverDate: toDateString(dates.handoverDate),
        initialHandoverDate: toDateString(dates.initialHandoverDate),
        updatedAt: timestamp,
      })
      .where(eq(projects.id, projectId));
  }

  async suspendProject(projectId: string, suspension: ProjectSuspension, timestamp: Date): Promise<boolean> {
    const updated = await db.update(projects)
      .set({
        isSuspended: true,
        suspendedDate: toDateString(suspension.suspendedDate),
        suspensionReason: suspension.reason,
        status: 'SUSPENDED',
        updatedAt: timestamp,
      })
      .where(and(eq(projects.id, projectId), eq(projects.isSuspended, false)))
      .returning({ id: projects.id });
    return updated.length > 0;
  }

  // Phases
  async listPhases(projectId: string): Promise<Phase[]> {
    const rows = await db.select().from(phases)
      .where(eq(phases.projectId, projectId))
      .orderBy(asc(phases.phaseNumber));
    return rows.map(toPhase);
  }

  async createPhase(projectId: string, phase: InsertPhaseRequest, phaseNumber: number): Promise<Phase> {
    const [row] = await db.insert(phases).values({
      projectId,
      phaseName: phase.phaseName,
      phaseNumber,
      startDate: phase.startDate ?? null,
      endDate: phase.endDate ?? null,
      isEnabled: phase.isEnabled ?? null,
      departments: phase.departments,
    }).returning();
    return toPhase(row);
  }

  async deletePhase(projectId: string, phaseId: string): Promise<boolean> {
    return await db.transaction(async (tx) => {
      await tx.delete(departments)
        .where(and(eq(departments.projectId, projectId), eq(departments.phaseId, phaseId)));
      const deleted = await tx.delete(phases)
        .where(and(eq(phases.projectId, projectId), eq(phases.id, phaseId)))
        .returning({ id: phases.id });
      return deleted.length > 0;
    });
  }

  async renumberPhases(projectId: string, orderedPhaseIds: string[]): Promise<void> {
    await db.transaction(async (tx) => {
      for (const [index, phaseId] of orderedPhaseIds.entries()) {
        await tx.update(phases)
          .set({ phaseNumber: index + 1, updatedAt: new Date() })
          .where(and(eq(phases.projectId, projectId), eq(phases.id, phaseId)));
      }
    });
  }

  async updatePhase(
    projectId: string,
    phaseId: string,
    update: PhaseUpdate,
    timelineChange: NewTimelineChange | null,
    timestamp: Date,
  ): Promise<Phase | undefined> {
    return await db.transaction(async (tx) => {
      const [row] = await tx.update(phases)
        .set({
          ...(update.phaseName !== undefined ? { phaseName: update.phaseName } : {}),
          ...(update.startDate !== undefined ? { startDate: toDateString(update.startDate) } : {}),
          ...(update.endDate !== undefined ? { endDate: toDateString(update.endDate) } : {}),
          ...(update.isEnabled !== undefined ? { isEnabled: update.isEnabled } : {}),
          updatedAt: timestamp,
        })
        .where(and(eq(phases.projectId, projectId), eq(phases.id, phaseId)))
        .returning();
      if (!row) return undefined;

      if (timelineChange) {
        await tx.insert(phaseTimelineChanges).values({
          projectId,
          phaseId,
          previousStartDate: toDateString(timelineChange.previousStartDate),
          previousEndDate: toDateString(timelineChange.previousEndDate),
          newStartDate: toDateString(timelineChange.newStartDate),
          newEndDate: toDateString(timelineChange.newEndDate),
          changedBy: timelineChange.changedBy,
          requestId: timelineChange.requestId,
          createdAt: timestamp,
        });
      }
      return toPhase(row);
    });
  }

  async listTimelineChanges(projectId: string, phaseId: string): Promise<PhaseTimelineChange[]> {
    const rows = await db.select().from(phaseTimelineChanges)
      .where(and(eq(phaseTimelineChanges.projectId, projectId), eq(phaseTimelineChanges.phaseId, phaseId)))
      .orderBy(desc(phaseTimelineChanges.createdAt));
    return rows.map(toPhaseTimelineChange);
  }

  // Phase extension requests
  async createPhaseRequest(request: NewPhaseRequest): Promise<PhaseRequest> {
    const [row] = await db.insert(phaseRequests).values({
      projectId: request.projectId,
      phaseId: request.phaseId,
      requestedBy: request.requestedBy,
      reason: request.reason,
      extendedDate: request.extendedDate.format(),
      status: 'PENDING',
    }).returning();
    return toPhaseRequest(row);
  }

  async getPhaseRequest(id: string): Promise<PhaseRequest | undefined> {
    const [row] = await db.select().from(phaseRequests).where(eq(phaseRequests.id, id));
    return row ? toPhaseRequest(row) : undefined;
  }

  async listPhaseRequests(projectId: string, status?: PhaseRequestStatus): Promise<PhaseRequest[]> {
    const rows = await db.select().from(phaseRequests)
      .where(status
        ? and(eq(phaseRequests.projectId, projectId), eq(phaseRequests.status, status))
        : eq(phaseRequests.projectId, projectId))
      .orderBy(desc(phaseRequests.createdAt));
    return rows.map(toPhaseRequest);
  }

  async decidePhaseRequest(id: string, decision: PhaseRequestDecision): Promise<PhaseRequest | undefined> {
    const [row] = await db.update(phaseRequests)
      .set({
        status: decision.status,
        decidedBy: decision.decidedBy,
        reasonToReact: decision.reasonToReact,
        updatedAt: decision.timestamp,
      })
      .where(and(eq(phaseRequests.id, id), eq(phaseRequests.status, 'PENDING')))
      .returning();
    return row ? toPhaseRequest(row) : undefined;
  }

  // Departments
  async listDepartments(projectId: string, phaseId: string): Promise<Department[]> {
    const rows = await db.select().from(departments)
      .where(and(eq(departments.projectId, projectId), eq(departments.phaseId, phaseId)));
    return rows.map(toDepartment);
  }

  async createDepartment(projectId: string, phaseId: string, department: InsertDepartmentRequest): Promise<Department> {
    const [row] = await db.insert(departments).values({
      projectId,
      phaseId,
      name: department.name,
      contractorMode: department.contractorMode,
      lineItems: department.lineItems,
    }).returning();
    return toDepartment(row);
  }

  // Expenses
  async listApprovedExpenses(projectId: string): Promise<Expense[]> {
    const rows = await db.select().from(expenses)
      .where(and(eq(expenses.projectId, projectId), eq(expenses.status, 'approved')));
    return rows.map(toExpense);
  }

  async getExpense(id: string): Promise<Expense | undefined> {
    const [row] = await db.select().from(expenses).where(eq(expenses.id, id));
    return row ? toExpense(row) : undefined;
  }

  async createExpense(expense: NewExpense): Promise<Expense> {
    const [row] = await db.insert(expenses).values({
      projectId: expense.projectId,
      phaseId: expense.phaseId,
      phaseName: expense.phaseName,
      department: expense.department,
      date: expense.date.format(),
      amount: toDecimalString(expense.amount),
      description: expense.description,
      status: 'pending',
      isAdmin: expense.isAdmin,
      submittedBy: expense.submittedBy,
    }).returning();
    return toExpense(row);
  }

  async decideExpense(id: string, decision: ExpenseDecision): Promise<Expense | undefined> {
    const approved = decision.status === 'approved';
    const [row] = await db.update(expenses)
      .set({
        status: decision.status,
        remark: decision.remark,
        approvedBy: approved ? decision.decidedBy : null,
        approvedAt: approved ? decision.timestamp : null,
        rejectedBy: approved ? null : decision.decidedBy,
        rejectedAt: approved ? null : decision.timestamp,
        updatedAt: decision.timestamp,
      })
      .where(and(eq(expenses.id, id), eq(expenses.status, 'pending')))
      .returning();
    return row ? toExpense(row) : undefined;
  }

  // Temporary approvers
  private async getLatestTempApproverId(projectId: string, approverId: string): Promise<string | undefined> {
    const [row] = await db.select({ id: tempApprovers.id }).from(tempApprovers)
      .where(and(eq(tempApprovers.projectId, projectId), eq(tempApprovers.approverId, approverId)))
      .orderBy(desc(tempApprovers.createdAt))
      .limit(1);
    return row?.id;
  }

  async getTempApprover(projectId: string, approverId: string): Promise<TempApprover | undefined> {
    const [row] = await db.select().from(tempApprovers)
      .where(and(eq(tempApprovers.projectId, projectId), eq(tempApprovers.approverId, approverId)))
      .orderBy(desc(tempApprovers.createdAt))
      .limit(1);
    return row ? toTempApprover(row) : undefined;
  }

  async createTempApprover(projectId: string, approverId: string, startDate: Date, endDate: Date): Promise<TempApprover> {
    return await db.transaction(async (tx) => {
      const [row] = await tx.insert(tempApprovers).values({
        projectId,
        approverId,
        startDate,
        endDate,
        status: 'pending',
      }).returning();

      await tx.update(projects)
        .set({ tempApproverId: approverId, updatedAt: new Date() })
        .where(eq(projects.id, projectId));

      return toTempApprover(row);
    });
  }

  async updateTempApproverStatus(
    projectId: string,
    approverId: string,
    expectedStatus: TempApproverStatus,
    newStatus: TempApproverStatus,
    reason?: string,
  ): Promise<boolean> {
    const id = await this.getLatestTempApproverId(projectId, approverId);
    if (!id) return false;

    const updated = await db.update(tempApprovers)
      .set({
        status: newStatus,
        updatedAt: new Date(),
        ...(reason !== undefined ? { rejectionReason: reason } : {}),
      })
      .where(and(eq(tempApprovers.id, id), eq(tempApprovers.status, expectedStatus)))
      .returning({ id: tempApprovers.id });
    return updated.length > 0;
  }

  async recordDelegatedApproval(projectId: string, approverId: string, expenseId: string): Promise<void> {
    const id = await this.getLatestTempApproverId(projectId, approverId);
    if (!id) return;

    await db.update(tempApprovers)
      .set({
        approvedExpense: sql`array_append(${tempApprovers.approvedExpense}, ${expenseId})`,
        updatedAt: new Date(),
      })
      .where(eq(tempApprovers.id, id));
  }

  async clearTempApproverAssignment(projectId: string, expectedApproverId: string): Promise<boolean> {
    const updated = await db.update(projects)
      .set({ tempApproverId: null })
      .where(and(eq(projects.id, projectId), eq(projects.tempApproverId, expectedApproverId)))
      .returning({ id: projects.id });
    return updated.length > 0;
  }
}

export const storage = new DatabaseStorage();
