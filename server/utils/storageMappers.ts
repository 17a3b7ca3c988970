/**
 * Storage mapping utilities for converting between database rows and domain snapshots.
 * Handles the impedance mismatch between Drizzle's string types for date/decimal columns
 * and the CalendarDate/number values the services work with.
 */

import { CalendarDate, toStoreDate } from "@shared/calendar-date";
import type {
  Department,
  Expense,
  Phase,
  PhaseRequest,
  PhaseTimelineChange,
  Project,
  TempApprover,
} from "@shared/models";
import {
  contractorModeEnum,
  expenseStatusEnum,
  phaseRequestStatusEnum,
  tempApproverStatusEnum,
  type DepartmentRow,
  type ExpenseRow,
  type PhaseRequestRow,
  type PhaseRow,
  type PhaseTimelineChangeRow,
  type ProjectRow,
  type TempApproverRow,
} from "@shared/schema";
import { decodeProjectStatus } from "../services/project-status";

/**
 * Convert a CalendarDate to the "dd/MM/yyyy" store format
 */
export function toDateString(date?: CalendarDate | null): string | null {
  return toStoreDate(date);
}

/**
 * Convert number to decimal string for decimal columns
 */
export function toDecimalString(num: number): string {
  return num.toFixed(2);
}

export function fromDecimalString(value: string | null | undefined): number {
  if (value == null) return 0;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

export function toProject(row: ProjectRow): Project {
  return {
    id: row.id,
    name: row.name,
    status: decodeProjectStatus(row.status),
    storedStatus: row.status,
    plannedDate: CalendarDate.parse(row.plannedDate),
    handoverDate: CalendarDate.parse(row.handoverDate),
    initialHandoverDate: CalendarDate.parse(row.initialHandoverDate),
    maintenanceDate: CalendarDate.parse(row.maintenanceDate),
    isSuspended: row.isSuspended,
    suspendedDate: CalendarDate.parse(row.suspendedDate),
    suspensionReason: row.suspensionReason,
    teamMembers: row.teamMembers,
    managerIds: row.managerIds,
    tempApproverId: row.tempApproverId,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export function toPhase(row: PhaseRow): Phase {
  return {
    id: row.id,
    projectId: row.projectId,
    phaseName: row.phaseName,
    phaseNumber: row.phaseNumber,
    startDate: CalendarDate.parse(row.startDate),
    endDate: CalendarDate.parse(row.endDate),
    isEnabled: row.isEnabled ?? true, // Absent means enabled
    legacyBudgets: row.departments,
  };
}

export function toDepartment(row: DepartmentRow): Department {
  const mode = contractorModeEnum.safeParse(row.contractorMode);
  return {
    id: row.id,
    projectId: row.projectId,
    phaseId: row.phaseId,
    name: row.name,
    contractorMode: mode.success ? mode.data : 'Labour-Only',
    lineItems: row.lineItems,
  };
}

export function toExpense(row: ExpenseRow): Expense {
  const status = expenseStatusEnum.safeParse(row.status);
  return {
    id: row.id,
    projectId: row.projectId,
    phaseId: row.phaseId,
    phaseName: row.phaseName,
    department: row.department,
    date: CalendarDate.parse(row.date),
    amount: fromDecimalString(row.amount),
    description: row.description,
    // Unknown values never count as approved spend
    status: status.success ? status.data : 'pending',
    remark: row.remark,
    isAdmin: row.isAdmin,
    submittedBy: row.submittedBy,
    approvedBy: row.approvedBy,
    rejectedBy: row.rejectedBy,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export function toTempApprover(row: TempApproverRow): TempApprover {
  const status = tempApproverStatusEnum.safeParse(row.status);
  return {
    id: row.id,
    projectId: row.projectId,
    approverId: row.approverId,
    startDate: row.startDate,
    endDate: row.endDate,
    // Unknown values carry no authority
    status: status.success ? status.data : 'expired',
    rejectionReason: row.rejectionReason,
    approvedExpense: row.approvedExpense,
    updatedAt: row.updatedAt,
  };
}

export function toPhaseRequest(row: PhaseRequestRow): PhaseRequest {
  const status = phaseRequestStatusEnum.safeParse(row.status);
  return {
    id: row.id,
    projectId: row.projectId,
    phaseId: row.phaseId,
    requestedBy: row.requestedBy,
    reason: row.reason,
    extendedDate: CalendarDate.parse(row.extendedDate),
    // Unknown values can no longer be decided
    status: status.success ? status.data : 'REJECTED',
    reasonToReact: row.reasonToReact,
    decidedBy: row.decidedBy,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export function toPhaseTimelineChange(row: PhaseTimelineChangeRow): PhaseTimelineChange {
  return {
    id: row.id,
    projectId: row.projectId,
    phaseId: row.phaseId,
    previousStartDate: CalendarDate.parse(row.previousStartDate),
    previousEndDate: CalendarDate.parse(row.previousEndDate),
    newStartDate: CalendarDate.parse(row.newStartDate),
    newEndDate: CalendarDate.parse(row.newEndDate),
    changedBy: row.changedBy,
    requestId: row.requestId,
    createdAt: row.createdAt,
  };
}
