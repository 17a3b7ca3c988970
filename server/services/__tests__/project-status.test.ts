import { describe, it, expect } from "vitest";
import {
  decodeProjectStatus,
  deriveHandoverDates,
  deriveStatusTransition,
  deriveUnsuspension,
  isClosedStatus,
  sortProjectsForDisplay,
} from "../project-status";
import { buildProject, day } from "./memory-storage";

describe("decodeProjectStatus", () => {
  it("keeps known statuses", () => {
    expect(decodeProjectStatus("MAINTENANCE")).toBe("MAINTENANCE");
  });

  it("maps unknown and missing values to LOCKED", () => {
    expect(decodeProjectStatus("ONGOING")).toBe("LOCKED");
    expect(decodeProjectStatus("active")).toBe("LOCKED");
    expect(decodeProjectStatus(null)).toBe("LOCKED");
  });
});

describe("deriveStatusTransition", () => {
  const today = day("15/06/2024");
  const base = { isSuspended: false, handoverDate: null, today };

  it("keeps an ACTIVE project with an active phase", () => {
    expect(deriveStatusTransition({ ...base, status: "ACTIVE", hasActivePhase: true })).toBeNull();
  });

  it("moves ACTIVE to STANDBY when no phase is active", () => {
    expect(deriveStatusTransition({ ...base, status: "ACTIVE", hasActivePhase: false })).toEqual({
      from: "ACTIVE",
      to: "STANDBY",
      reason: "no-active-phase",
    });
  });

  it("moves STANDBY to ACTIVE up to and including the handover date", () => {
    const handoverDate = day("31/12/2024");

    expect(deriveStatusTransition({ ...base, status: "STANDBY", hasActivePhase: true, handoverDate })?.to).toBe("ACTIVE");
    expect(deriveStatusTransition({
      ...base,
      status: "STANDBY",
      hasActivePhase: true,
      handoverDate,
      today: handoverDate,
    })?.to).toBe("ACTIVE");
  });

  it("moves STANDBY to MAINTENANCE after the handover date", () => {
    expect(deriveStatusTransition({
      status: "STANDBY",
      isSuspended: false,
      hasActivePhase: true,
      handoverDate: day("31/12/2024"),
      today: day("01/01/2025"),
    })).toEqual({ from: "STANDBY", to: "MAINTENANCE", reason: "phase-active-after-handover" });
  });

  it("moves STANDBY to ACTIVE when there is no handover date", () => {
    expect(deriveStatusTransition({ ...base, status: "STANDBY", hasActivePhase: true })?.to).toBe("ACTIVE");
  });

  it("leaves STANDBY alone while no phase is active", () => {
    expect(deriveStatusTransition({ ...base, status: "STANDBY", hasActivePhase: false })).toBeNull();
  });

  it("never moves a suspended project", () => {
    expect(deriveStatusTransition({ ...base, status: "ACTIVE", isSuspended: true, hasActivePhase: false })).toBeNull();
  });

  it("has no automatic transition for other statuses", () => {
    for (const status of ["IN_REVIEW", "LOCKED", "DECLINED", "COMPLETED", "ARCHIVE", "MAINTENANCE"] as const) {
      expect(deriveStatusTransition({ ...base, status, hasActivePhase: false })).toBeNull();
      expect(deriveStatusTransition({ ...base, status, hasActivePhase: true })).toBeNull();
    }
  });
});

describe("deriveUnsuspension", () => {
  const today = day("15/06/2024");

  it("waits until the suspension date has passed", () => {
    const project = buildProject({ isSuspended: true, suspendedDate: today, plannedDate: day("01/06/2024") });
    expect(deriveUnsuspension(project, today)).toBeNull();
  });

  it("returns to ACTIVE once the planned date has arrived", () => {
    const project = buildProject({ isSuspended: true, suspendedDate: day("14/06/2024"), plannedDate: today });
    expect(deriveUnsuspension(project, today)).toEqual({ to: "ACTIVE" });
  });

  it("returns to LOCKED before the planned date or without one", () => {
    const future = buildProject({ isSuspended: true, suspendedDate: day("14/06/2024"), plannedDate: day("16/06/2024") });
    const unplanned = buildProject({ isSuspended: true, suspendedDate: day("14/06/2024") });

    expect(deriveUnsuspension(future, today)).toEqual({ to: "LOCKED" });
    expect(deriveUnsuspension(unplanned, today)).toEqual({ to: "LOCKED" });
  });

  it("ignores projects that are not suspended", () => {
    expect(deriveUnsuspension(buildProject({ suspendedDate: day("01/01/2024") }), today)).toBeNull();
  });

  it("never lifts a suspension without an end date", () => {
    expect(deriveUnsuspension(buildProject({ isSuspended: true, plannedDate: day("01/06/2024") }), today)).toBeNull();
  });
});

describe("isClosedStatus", () => {
  it("covers only the statuses a project does not leave", () => {
    expect(["COMPLETED", "DECLINED", "ARCHIVE"].every(status => isClosedStatus(decodeProjectStatus(status)))).toBe(true);
    expect(isClosedStatus("ACTIVE")).toBe(false);
    expect(isClosedStatus("SUSPENDED")).toBe(false);
  });
});

describe("deriveHandoverDates", () => {
  const endDates = [day("10/05/2024"), null, day("20/08/2024")];

  it("follows the latest phase end date", () => {
    const dates = deriveHandoverDates(
      buildProject({ status: "ACTIVE", initialHandoverDate: day("01/06/2024") }),
      endDates,
    );

    expect(dates.handoverDate?.format()).toBe("20/08/2024");
    expect(dates.initialHandoverDate?.format()).toBe("01/06/2024");
  });

  it("moves the initial handover date while the project is being planned", () => {
    const dates = deriveHandoverDates(
      buildProject({ status: "IN_REVIEW", initialHandoverDate: day("01/06/2024") }),
      endDates,
    );

    expect(dates.initialHandoverDate?.format()).toBe("20/08/2024");
  });

  it("clears the handover date when no phase has an end date", () => {
    expect(deriveHandoverDates(buildProject(), [null]).handoverDate).toBeNull();
  });
});

describe("sortProjectsForDisplay", () => {
  it("orders by status rank, newest first within a status", () => {
    const sorted = sortProjectsForDisplay([
      buildProject({ id: "standby", status: "STANDBY" }),
      buildProject({ id: "active-old", status: "ACTIVE", createdAt: new Date(2024, 0, 1) }),
      buildProject({ id: "archive", status: "ARCHIVE" }),
      buildProject({ id: "active-new", status: "ACTIVE", createdAt: new Date(2024, 2, 1) }),
      buildProject({ id: "review", status: "IN_REVIEW" }),
      buildProject({ id: "completed", status: "COMPLETED" }),
    ]);

    expect(sorted.map(project => project.id)).toEqual([
      "review",
      "active-new",
      "active-old",
      "completed",
      "archive",
      "standby",
    ]);
  });
});
