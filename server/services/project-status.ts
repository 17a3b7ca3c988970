import type { CalendarDate } from "@shared/calendar-date";
import type { Project } from "@shared/models";
import { projectStatusEnum, type ProjectStatus } from "@shared/schema";

/** Legacy or unknown stored values decode to LOCKED. */
export function decodeProjectStatus(value: string | null | undefined): ProjectStatus {
  const parsed = projectStatusEnum.safeParse(value);
  return parsed.success ? parsed.data : 'LOCKED';
}

export type StatusTransitionReason =
  | 'no-active-phase'
  | 'phase-active-before-handover'
  | 'phase-active-after-handover';

export interface StatusTransition {
  from: ProjectStatus;
  to: ProjectStatus;
  reason: StatusTransitionReason;
}

export interface StatusPassInput {
  status: ProjectStatus;
  isSuspended: boolean;
  hasActivePhase: boolean;
  handoverDate: CalendarDate | null;
  today: CalendarDate;
}

/**
 * One evaluation of the phase-driven transitions. Returns null when the
 * project is stable; suspended projects are always stable here.
 */
export function deriveStatusTransition(input: StatusPassInput): StatusTransition | null {
  if (input.isSuspended) return null;

  if (input.status === 'ACTIVE' && !input.hasActivePhase) {
    return { from: 'ACTIVE', to: 'STANDBY', reason: 'no-active-phase' };
  }

  if (input.status === 'STANDBY' && input.hasActivePhase) {
    if (!input.handoverDate || !input.handoverDate.isBefore(input.today)) {
      return { from: 'STANDBY', to: 'ACTIVE', reason: 'phase-active-before-handover' };
    }
    return { from: 'STANDBY', to: 'MAINTENANCE', reason: 'phase-active-after-handover' };
  }

  return null;
}

/** Only ACTIVE and STANDBY projects take part in the phase-driven pass. */
export function isPhaseDrivenStatus(status: ProjectStatus): boolean {
  return status === 'ACTIVE' || status === 'STANDBY';
}

export interface Unsuspension {
  to: ProjectStatus;
}

/**
 * A suspension lifts once its date is strictly in the past. The project goes
 * back to ACTIVE when its planned date has arrived, LOCKED otherwise.
 */
export function deriveUnsuspension(
  project: Pick<Project, 'isSuspended' | 'suspendedDate' | 'plannedDate'>,
  today: CalendarDate,
): Unsuspension | null {
  if (!project.isSuspended || !project.suspendedDate) return null;
  if (!project.suspendedDate.isBefore(today)) return null;
  return { to: resumeStatus(project.plannedDate, today) };
}

/** Status a project returns to when its suspension ends. */
export function resumeStatus(plannedDate: CalendarDate | null, today: CalendarDate): ProjectStatus {
  return plannedDate && !plannedDate.isAfter(today) ? 'ACTIVE' : 'LOCKED';
}

const CLOSED_STATUSES: readonly ProjectStatus[] = ['COMPLETED', 'DECLINED', 'ARCHIVE'];

export function isClosedStatus(status: ProjectStatus): boolean {
  return CLOSED_STATUSES.includes(status);
}

/**
 * Handover follows the latest phase end date. The initial handover date is
 * only allowed to move while the project is still being planned.
 */
export function deriveHandoverDates(
  project: Pick<Project, 'status' | 'initialHandoverDate'>,
  phaseEndDates: readonly (CalendarDate | null)[],
): { handoverDate: CalendarDate | null; initialHandoverDate: CalendarDate | null } {
  let latest: CalendarDate | null = null;
  for (const endDate of phaseEndDates) {
    if (endDate && (!latest || endDate.isAfter(latest))) latest = endDate;
  }

  const planning = project.status === 'LOCKED' || project.status === 'IN_REVIEW';
  return {
    handoverDate: latest,
    initialHandoverDate: planning ? latest : project.initialHandoverDate,
  };
}

const DISPLAY_ORDER: readonly ProjectStatus[] = [
  'IN_REVIEW',
  'ACTIVE',
  'MAINTENANCE',
  'COMPLETED',
  'DECLINED',
  'ARCHIVE',
];

/** Display order for project lists; newest first within the same status. */
export function sortProjectsForDisplay<T extends Pick<Project, 'status' | 'createdAt'>>(projects: readonly T[]): T[] {
  const rank = (status: ProjectStatus) => {
    const index = DISPLAY_ORDER.indexOf(status);
    return index === -1 ? DISPLAY_ORDER.length : index;
  };

  return [...projects].sort((a, b) => {
    const byStatus = rank(a.status) - rank(b.status);
    if (byStatus !== 0) return byStatus;
    return b.createdAt.getTime() - a.createdAt.getTime();
  });
}
