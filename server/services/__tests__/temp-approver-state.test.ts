import { describe, it, expect } from "vitest";
import {
  canApproveExpenses,
  currentStatus,
  isLiveDelegation,
  needsStatusUpdate,
  statusOnAcceptance,
  validateDelegationWindow,
} from "../temp-approver-state";
import { buildProject, buildTempApprover } from "./memory-storage";

// Window: 1 June 2024 00:00 to 10 June 2024 00:00, local time
const beforeWindow = new Date(2024, 4, 20);
const insideWindow = new Date(2024, 5, 5, 12);
const afterWindow = new Date(2024, 5, 11);

describe("currentStatus", () => {
  it("keeps a rejected delegation rejected at every instant", () => {
    const rejected = buildTempApprover({ status: "rejected" });
    for (const now of [beforeWindow, insideWindow, afterWindow]) {
      expect(currentStatus(rejected, now)).toBe("rejected");
    }
  });

  it("keeps an expired delegation expired", () => {
    expect(currentStatus(buildTempApprover({ status: "expired" }), insideWindow)).toBe("expired");
  });

  it("expires a pending delegation once the window has ended", () => {
    const pending = buildTempApprover({ status: "pending" });

    expect(currentStatus(pending, insideWindow)).toBe("pending");
    expect(currentStatus(pending, new Date(2024, 5, 10))).toBe("pending");
    expect(currentStatus(pending, afterWindow)).toBe("expired");
  });

  it("activates an accepted delegation inside its window", () => {
    const accepted = buildTempApprover({ status: "accepted" });

    expect(currentStatus(accepted, beforeWindow)).toBe("accepted");
    expect(currentStatus(accepted, new Date(2024, 5, 1))).toBe("active");
    expect(currentStatus(accepted, insideWindow)).toBe("active");
    expect(currentStatus(accepted, afterWindow)).toBe("expired");
  });

  it("expires an active delegation after its window", () => {
    const active = buildTempApprover({ status: "active" });

    expect(currentStatus(active, insideWindow)).toBe("active");
    expect(currentStatus(active, afterWindow)).toBe("expired");
  });

  it("reports when the stored status is behind the clock", () => {
    expect(needsStatusUpdate(buildTempApprover({ status: "pending" }), afterWindow)).toBe(true);
    expect(needsStatusUpdate(buildTempApprover({ status: "active" }), insideWindow)).toBe(false);
  });

  it("treats only pending, accepted and active delegations as live", () => {
    expect(isLiveDelegation(buildTempApprover({ status: "pending" }), insideWindow)).toBe(true);
    expect(isLiveDelegation(buildTempApprover({ status: "pending" }), afterWindow)).toBe(false);
    expect(isLiveDelegation(buildTempApprover({ status: "rejected" }), insideWindow)).toBe(false);
  });
});

describe("statusOnAcceptance", () => {
  it("goes straight to active when accepted inside the window", () => {
    expect(statusOnAcceptance(buildTempApprover(), insideWindow)).toBe("active");
  });

  it("stays accepted until the window starts", () => {
    expect(statusOnAcceptance(buildTempApprover(), beforeWindow)).toBe("accepted");
  });
});

describe("canApproveExpenses", () => {
  const project = buildProject({ tempApproverId: "delegate-1" });

  it("lets the project manager approve", () => {
    expect(canApproveExpenses(project, "manager-1", undefined, insideWindow)).toBe(true);
  });

  it("lets the assigned delegate approve while accepted or active", () => {
    expect(canApproveExpenses(project, "delegate-1", buildTempApprover({ status: "accepted" }), insideWindow)).toBe(true);
    expect(canApproveExpenses(project, "delegate-1", buildTempApprover({ status: "accepted" }), beforeWindow)).toBe(true);
  });

  it("denies a delegate who has not accepted or whose window is over", () => {
    expect(canApproveExpenses(project, "delegate-1", buildTempApprover({ status: "pending" }), insideWindow)).toBe(false);
    expect(canApproveExpenses(project, "delegate-1", buildTempApprover({ status: "active" }), afterWindow)).toBe(false);
    expect(canApproveExpenses(project, "delegate-1", undefined, insideWindow)).toBe(false);
  });

  it("denies anyone who is not the assigned delegate", () => {
    const delegation = buildTempApprover({ approverId: "someone-else", status: "active" });
    expect(canApproveExpenses(project, "someone-else", delegation, insideWindow)).toBe(false);
    expect(canApproveExpenses(buildProject(), "delegate-1", buildTempApprover({ status: "active" }), insideWindow)).toBe(false);
  });
});

describe("validateDelegationWindow", () => {
  const now = new Date(2024, 5, 1, 9);

  it("rejects a start in the past", () => {
    expect(validateDelegationWindow(new Date(2024, 4, 31), new Date(2024, 5, 5), now)).toEqual({
      isValid: false,
      errorMessage: "Start date cannot be in the past",
    });
  });

  it("rejects an end that is not after the start", () => {
    const start = new Date(2024, 5, 2);
    expect(validateDelegationWindow(start, start, now)).toEqual({
      isValid: false,
      errorMessage: "End date must be after start date",
    });
  });

  it("allows at most 30 days", () => {
    expect(validateDelegationWindow(new Date(2024, 5, 2), new Date(2024, 6, 2), now)).toEqual({ isValid: true });
    expect(validateDelegationWindow(new Date(2024, 5, 2), new Date(2024, 6, 3), now)).toEqual({
      isValid: false,
      errorMessage: "Temporary approver period cannot exceed 30 days",
    });
  });
});
