/**
 * Budget aggregation for a project's phase → department hierarchy.
 *
 * Everything in this module is a pure function over snapshots: callers load
 * phases, departments and approved expenses, and get back the allocated,
 * approved and remaining figures per bucket. Overspend shows up as a negative
 * remaining value.
 */

import type { CalendarDate } from "@shared/calendar-date";
import type { Department, Expense, Phase } from "@shared/models";
import type { ContractorMode } from "@shared/schema";

export type PhaseTimelineState = 'upcoming' | 'in-progress' | 'expired';

export interface DepartmentBudgetSummary {
  key: string;
  name: string;
  departmentId: string;
  contractorMode: ContractorMode;
  allocatedBudget: number;
  approvedAmount: number;
  remaining: number;
}

export interface PhaseBudgetSummary {
  phaseId: string;
  phaseName: string;
  phaseNumber: number;
  startDate: CalendarDate | null;
  endDate: CalendarDate | null;
  isEnabled: boolean;
  inTimeline: boolean;
  timeline: PhaseTimelineState;
  totalBudget: number;
  approvedAmount: number;
  remaining: number;
  /** Empty when degraded: the legacy map only supports phase-level figures. */
  departments: DepartmentBudgetSummary[];
  degraded: boolean;
}

export interface ProjectBudgetReport {
  projectId: string;
  asOf: CalendarDate;
  phases: PhaseBudgetSummary[];
  totalBudget: number;
  approvedAmount: number;
  remaining: number;
  hasActivePhase: boolean;
  degradedPhaseIds: string[];
  unattributedExpenseIds: string[];
}

export interface PhaseBudgetInput {
  phase: Phase;
  /** null when the department load failed for this phase. */
  departments: readonly Department[] | null;
}

export interface BudgetAggregationInput {
  projectId: string;
  phases: readonly PhaseBudgetInput[];
  approvedExpenses: readonly Expense[];
  today: CalendarDate;
}

export function roundCurrency(value: number): number {
  return Math.round(value * 100) / 100;
}

export function departmentKey(phaseId: string, name: string): string {
  return `${phaseId}_${name}`;
}

/** Older expenses stored the bare department name; scope them to their phase. */
export function normalizeDepartmentKey(phaseId: string, value: string): string {
  return value.startsWith(`${phaseId}_`) ? value : departmentKey(phaseId, value);
}

export function departmentAllocatedBudget(department: Pick<Department, 'lineItems'>): number {
  return roundCurrency(
    department.lineItems.reduce((sum, item) => sum + item.quantity * item.unitPrice, 0),
  );
}

/**
 * Inclusive containment of `day` in [startDate, endDate]; a missing bound is
 * unbounded on that side.
 */
export function isPhaseInTimeline(
  phase: Pick<Phase, 'startDate' | 'endDate'>,
  day: CalendarDate,
): boolean {
  if (phase.startDate && phase.startDate.isAfter(day)) return false;
  if (phase.endDate && phase.endDate.isBefore(day)) return false;
  return true;
}

export function classifyPhaseTimeline(
  phase: Pick<Phase, 'startDate' | 'endDate'>,
  day: CalendarDate,
): PhaseTimelineState {
  if (phase.startDate && phase.startDate.isAfter(day)) return 'upcoming';
  if (phase.endDate && phase.endDate.isBefore(day)) return 'expired';
  return 'in-progress';
}

/** True when at least one enabled phase contains `day`. */
export function hasActivePhase(phases: readonly Phase[], day: CalendarDate): boolean {
  return phases.some(phase => phase.isEnabled && isPhaseInTimeline(phase, day));
}

interface PhaseExpenseBucket {
  total: number;
  byDepartment: Map<string, { total: number; expenseIds: string[] }>;
}

function bucketExpenses(
  expenses: readonly Expense[],
  knownPhaseIds: ReadonlySet<string>,
): { byPhase: Map<string, PhaseExpenseBucket>; projectTotal: number; orphanIds: string[] } {
  const byPhase = new Map<string, PhaseExpenseBucket>();
  const orphanIds: string[] = [];
  let projectTotal = 0;

  for (const expense of expenses) {
    if (expense.status !== 'approved') continue;
    projectTotal += expense.amount;

    if (!expense.phaseId || !knownPhaseIds.has(expense.phaseId)) {
      orphanIds.push(expense.id);
      continue;
    }

    let bucket = byPhase.get(expense.phaseId);
    if (!bucket) {
      bucket = { total: 0, byDepartment: new Map() };
      byPhase.set(expense.phaseId, bucket);
    }
    bucket.total += expense.amount;

    const key = normalizeDepartmentKey(expense.phaseId, expense.department).toLowerCase();
    const departmentBucket = bucket.byDepartment.get(key) ?? { total: 0, expenseIds: [] };
    departmentBucket.total += expense.amount;
    departmentBucket.expenseIds.push(expense.id);
    bucket.byDepartment.set(key, departmentBucket);
  }

  return { byPhase, projectTotal, orphanIds };
}

function summarizePhase(
  input: PhaseBudgetInput,
  bucket: PhaseExpenseBucket | undefined,
  today: CalendarDate,
): { summary: PhaseBudgetSummary; unmatchedExpenseIds: string[] } {
  const { phase } = input;
  const approvedAmount = roundCurrency(bucket?.total ?? 0);
  const degraded = input.departments === null || input.departments.length === 0;
  const unmatchedExpenseIds: string[] = [];

  let totalBudget: number;
  let departmentSummaries: DepartmentBudgetSummary[] = [];

  if (degraded) {
    totalBudget = roundCurrency(
      Object.values(phase.legacyBudgets).reduce((sum, amount) => sum + amount, 0),
    );
  } else {
    const loaded = input.departments ?? [];
    const matchedKeys = new Set<string>();

    departmentSummaries = loaded.map((department) => {
      const key = departmentKey(phase.id, department.name);
      matchedKeys.add(key.toLowerCase());
      const allocatedBudget = departmentAllocatedBudget(department);
      const departmentApproved = roundCurrency(bucket?.byDepartment.get(key.toLowerCase())?.total ?? 0);
      return {
        key,
        name: department.name,
        departmentId: department.id,
        contractorMode: department.contractorMode,
        allocatedBudget,
        approvedAmount: departmentApproved,
        remaining: roundCurrency(allocatedBudget - departmentApproved),
      };
    });
    departmentSummaries.sort((a, b) => a.name.localeCompare(b.name));

    totalBudget = roundCurrency(departmentSummaries.reduce((sum, d) => sum + d.allocatedBudget, 0));

    bucket?.byDepartment.forEach((departmentBucket, key) => {
      if (!matchedKeys.has(key)) unmatchedExpenseIds.push(...departmentBucket.expenseIds);
    });
  }

  const inTimeline = isPhaseInTimeline(phase, today);

  return {
    summary: {
      phaseId: phase.id,
      phaseName: phase.phaseName,
      phaseNumber: phase.phaseNumber,
      startDate: phase.startDate,
      endDate: phase.endDate,
      isEnabled: phase.isEnabled,
      inTimeline,
      timeline: classifyPhaseTimeline(phase, today),
      totalBudget,
      approvedAmount,
      remaining: roundCurrency(totalBudget - approvedAmount),
      departments: departmentSummaries,
      degraded,
    },
    unmatchedExpenseIds,
  };
}

export function aggregateProjectBudget(input: BudgetAggregationInput): ProjectBudgetReport {
  const orderedPhases = [...input.phases].sort((a, b) => a.phase.phaseNumber - b.phase.phaseNumber);
  const knownPhaseIds = new Set(orderedPhases.map(entry => entry.phase.id));
  const { byPhase, projectTotal, orphanIds } = bucketExpenses(input.approvedExpenses, knownPhaseIds);

  const phases: PhaseBudgetSummary[] = [];
  const unattributedExpenseIds = [...orphanIds];

  for (const entry of orderedPhases) {
    const { summary, unmatchedExpenseIds } = summarizePhase(entry, byPhase.get(entry.phase.id), input.today);
    phases.push(summary);
    unattributedExpenseIds.push(...unmatchedExpenseIds);
  }

  const totalBudget = roundCurrency(phases.reduce((sum, phase) => sum + phase.totalBudget, 0));
  const approvedAmount = roundCurrency(projectTotal);

  return {
    projectId: input.projectId,
    asOf: input.today,
    phases,
    totalBudget,
    approvedAmount,
    remaining: roundCurrency(totalBudget - approvedAmount),
    hasActivePhase: phases.some(phase => phase.isEnabled && phase.inTimeline),
    degradedPhaseIds: phases.filter(phase => phase.degraded).map(phase => phase.phaseId),
    unattributedExpenseIds,
  };
}

export function findDepartmentSummary(
  phase: PhaseBudgetSummary,
  department: string,
): DepartmentBudgetSummary | undefined {
  const key = normalizeDepartmentKey(phase.phaseId, department).toLowerCase();
  return phase.departments.find(summary => summary.key.toLowerCase() === key);
}
