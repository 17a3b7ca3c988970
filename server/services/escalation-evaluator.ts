import type { DepartmentBudgetSummary, PhaseBudgetSummary } from "./budget-aggregator";

export type EscalationReason =
  | 'phase-budget-zero'
  | 'phase-overrun'
  | 'department-budget-zero'
  | 'department-overrun'
  | 'department-figures-unavailable';

export interface EscalationDecision {
  isAdmin: boolean;
  reasons: EscalationReason[];
  messages: string[];
}

const REASON_MESSAGES: Record<EscalationReason, string> = {
  'phase-budget-zero': 'Phase total budget is 0, so expense will be approved by admin',
  'phase-overrun': 'Entered amount is greater than remaining amount in phase, so expense will be approved by admin',
  'department-budget-zero': 'Department total budget is 0, so expense will be approved by admin',
  'department-overrun': 'Entered amount is greater than remaining amount in department, so expense will be approved by admin',
  'department-figures-unavailable': 'Department budget figures are unavailable, so expense will be approved by admin',
};

/**
 * Decide whether a candidate expense needs admin approval.
 *
 * `phase` and `department` must be the figures from before the candidate is
 * added. Comparisons are strict: spending exactly the remaining amount is
 * within budget. A zero-budget bucket is never implicitly authorized.
 * `department` is undefined when the phase is degraded or the department is
 * unknown; the department checks then fail closed.
 */
export function evaluateEscalation(
  amount: number,
  phase: Pick<PhaseBudgetSummary, 'totalBudget' | 'remaining'>,
  department: Pick<DepartmentBudgetSummary, 'allocatedBudget' | 'remaining'> | undefined,
): EscalationDecision {
  const reasons: EscalationReason[] = [];

  if (amount <= 0) {
    return { isAdmin: false, reasons, messages: [] };
  }

  if (phase.totalBudget === 0) {
    reasons.push('phase-budget-zero');
  } else if (amount > phase.remaining) {
    reasons.push('phase-overrun');
  }

  if (!department) {
    reasons.push('department-figures-unavailable');
  } else if (department.allocatedBudget === 0) {
    reasons.push('department-budget-zero');
  } else if (amount > department.remaining) {
    reasons.push('department-overrun');
  }

  return {
    isAdmin: reasons.length > 0,
    reasons,
    messages: reasons.map(reason => REASON_MESSAGES[reason]),
  };
}
