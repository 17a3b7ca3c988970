import { differenceInCalendarDays } from "date-fns";
import type { Project, TempApprover } from "@shared/models";
import type { TempApproverStatus } from "@shared/schema";

export const MAX_DELEGATION_DAYS = 30;

type DelegationWindow = Pick<TempApprover, 'status' | 'startDate' | 'endDate'>;

/**
 * Status of a delegation as observed at `now`. Stored status is only a
 * starting point: pending and accepted delegations move forward with the
 * clock, rejected and expired ones never change.
 */
export function currentStatus(delegation: DelegationWindow, now: Date): TempApproverStatus {
  const time = now.getTime();
  const start = delegation.startDate.getTime();
  const end = delegation.endDate.getTime();

  switch (delegation.status) {
    case 'rejected':
      return 'rejected';
    case 'expired':
      return 'expired';
    case 'pending':
      return time > end ? 'expired' : 'pending';
    case 'accepted':
      if (time > end) return 'expired';
      if (time >= start) return 'active';
      return 'accepted';
    case 'active':
      return time > end ? 'expired' : 'active';
  }
}

export function needsStatusUpdate(delegation: DelegationWindow, now: Date): boolean {
  return currentStatus(delegation, now) !== delegation.status;
}

/** The delegation still holds (or may still gain) approval authority. */
export function isLiveDelegation(delegation: DelegationWindow, now: Date): boolean {
  const status = currentStatus(delegation, now);
  return status === 'pending' || status === 'accepted' || status === 'active';
}

/** Status to store when the delegate accepts at `now`. */
export function statusOnAcceptance(delegation: DelegationWindow, now: Date): TempApproverStatus {
  return currentStatus({ ...delegation, status: 'accepted' }, now);
}

export function hasDelegatedAuthority(delegation: DelegationWindow, now: Date): boolean {
  const status = currentStatus(delegation, now);
  return status === 'accepted' || status === 'active';
}

/**
 * Whether `userId` may approve expenses for `project`: the project's manager,
 * or its assigned delegate while the delegation is accepted or active.
 */
export function canApproveExpenses(
  project: Pick<Project, 'managerIds' | 'tempApproverId'>,
  userId: string,
  delegation: TempApprover | undefined,
  now: Date,
): boolean {
  if (project.managerIds[0] === userId) return true;
  if (!project.tempApproverId || project.tempApproverId !== userId) return false;
  if (!delegation || delegation.approverId !== userId) return false;
  return hasDelegatedAuthority(delegation, now);
}

export type DelegationWindowValidation =
  | { isValid: true }
  | { isValid: false; errorMessage: string };

export function validateDelegationWindow(startDate: Date, endDate: Date, now: Date): DelegationWindowValidation {
  if (startDate.getTime() < now.getTime()) {
    return { isValid: false, errorMessage: "Start date cannot be in the past" };
  }
  if (endDate.getTime() <= startDate.getTime()) {
    return { isValid: false, errorMessage: "End date must be after start date" };
  }
  if (differenceInCalendarDays(endDate, startDate) > MAX_DELEGATION_DAYS) {
    return { isValid: false, errorMessage: `Temporary approver period cannot exceed ${MAX_DELEGATION_DAYS} days` };
  }
  return { isValid: true };
}
