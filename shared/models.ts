import type { CalendarDate } from "./calendar-date";
import type {
  ContractorMode,
  DepartmentLineItem,
  ExpenseStatus,
  PhaseRequestStatus,
  ProjectStatus,
  TempApproverStatus,
} from "./schema";

/**
 * Immutable views of stored entities, decoded at the store boundary.
 * Dates are CalendarDate values, amounts are numbers, statuses are closed enums.
 */

export interface Project {
  readonly id: string;
  readonly name: string;
  readonly status: ProjectStatus;
  /** The value as stored, kept for conditional writes against unrecognised legacy statuses. */
  readonly storedStatus: string;
  readonly plannedDate: CalendarDate | null;
  readonly handoverDate: CalendarDate | null;
  readonly initialHandoverDate: CalendarDate | null;
  readonly maintenanceDate: CalendarDate | null;
  readonly isSuspended: boolean;
  readonly suspendedDate: CalendarDate | null;
  readonly suspensionReason: string | null;
  readonly teamMembers: readonly string[];
  readonly managerIds: readonly string[];
  readonly tempApproverId: string | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface Phase {
  readonly id: string;
  readonly projectId: string;
  readonly phaseName: string;
  readonly phaseNumber: number;
  readonly startDate: CalendarDate | null;
  readonly endDate: CalendarDate | null;
  readonly isEnabled: boolean;
  /** Legacy department-key → amount map, used only when departments cannot be loaded. */
  readonly legacyBudgets: Readonly<Record<string, number>>;
}

export interface Department {
  readonly id: string;
  readonly projectId: string;
  readonly phaseId: string;
  readonly name: string;
  readonly contractorMode: ContractorMode;
  readonly lineItems: readonly DepartmentLineItem[];
}

export interface Expense {
  readonly id: string;
  readonly projectId: string;
  readonly phaseId: string | null;
  readonly phaseName: string | null;
  /** Phase-scoped key: "<phaseId>_<department name>". */
  readonly department: string;
  readonly date: CalendarDate | null;
  readonly amount: number;
  readonly description: string | null;
  readonly status: ExpenseStatus;
  readonly remark: string | null;
  readonly isAdmin: boolean;
  readonly submittedBy: string;
  readonly approvedBy: string | null;
  readonly rejectedBy: string | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface TempApprover {
  readonly id: string;
  readonly projectId: string;
  readonly approverId: string;
  readonly startDate: Date;
  readonly endDate: Date;
  readonly status: TempApproverStatus;
  readonly rejectionReason: string | null;
  readonly approvedExpense: readonly string[];
  readonly updatedAt: Date;
}

export interface PhaseRequest {
  readonly id: string;
  readonly projectId: string;
  readonly phaseId: string;
  readonly requestedBy: string;
  readonly reason: string;
  /** Requested new end date; null when the stored value does not parse. */
  readonly extendedDate: CalendarDate | null;
  readonly status: PhaseRequestStatus;
  readonly reasonToReact: string | null;
  readonly decidedBy: string | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface PhaseTimelineChange {
  readonly id: string;
  readonly projectId: string;
  readonly phaseId: string;
  readonly previousStartDate: CalendarDate | null;
  readonly previousEndDate: CalendarDate | null;
  readonly newStartDate: CalendarDate | null;
  readonly newEndDate: CalendarDate | null;
  readonly changedBy: string;
  readonly requestId: string | null;
  readonly createdAt: Date;
}

/** Acting user, as handed over by the authentication layer. */
export interface Actor {
  readonly id: string;
  readonly isAdmin: boolean;
}
