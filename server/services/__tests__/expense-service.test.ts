import { describe, it, expect, beforeEach } from "vitest";
import { ZodError } from "zod";
import type { Actor } from "@shared/models";
import { ChangeNotifier } from "../change-notifier";
import { ServiceError } from "../errors";
import { ExpenseService } from "../expense-service";
import { ReconciliationDriver } from "../reconciliation-driver";
import {
  FakeClock,
  MemoryStorage,
  buildDepartment,
  buildExpense,
  buildPhase,
  buildProject,
  buildTempApprover,
  day,
} from "./memory-storage";

const member: Actor = { id: "member-1", isAdmin: false };
const manager: Actor = { id: "manager-1", isAdmin: false };
const admin: Actor = { id: "admin-1", isAdmin: true };

describe("ExpenseService", () => {
  let storage: MemoryStorage;
  let service: ExpenseService;

  beforeEach(() => {
    storage = new MemoryStorage().seed({
      projects: [buildProject()],
      phases: [
        buildPhase({ id: "phase-1", startDate: day("01/06/2024"), endDate: day("30/06/2024") }),
        buildPhase({ id: "phase-2", phaseName: "Structure", phaseNumber: 2, legacyBudgets: { "phase-2_Civil": 3000 } }),
        buildPhase({ id: "phase-3", phaseName: "Landscaping", phaseNumber: 3, isEnabled: false }),
      ],
      departments: [buildDepartment({ budget: 10000 })],
      expenses: [buildExpense({ id: "approved-1", amount: 9500 })],
    });
    const clock = new FakeClock(new Date(2024, 5, 15, 10));
    const notifier = new ChangeNotifier();
    service = new ExpenseService(storage, new ReconciliationDriver(storage, notifier, clock), notifier, clock);
  });

  const request = (overrides: Record<string, unknown> = {}) => ({
    phaseId: "phase-1",
    department: "Electrical",
    date: "15/06/2024",
    amount: 500,
    ...overrides,
  });

  describe("previewExpense", () => {
    it("escalates an amount above the remaining department balance", async () => {
      const preview = await service.previewExpense("project-1", request({ amount: 600 }));

      expect(preview.department?.remaining).toBe(500);
      expect(preview.decision.isAdmin).toBe(true);
      expect(preview.decision.reasons).toEqual(["phase-overrun", "department-overrun"]);
      expect(storage.writes).toEqual([]);
    });

    it("does not escalate an amount equal to the remaining balance", async () => {
      const preview = await service.previewExpense("project-1", request({ amount: 500 }));

      expect(preview.decision.isAdmin).toBe(false);
    });
  });

  describe("submitExpense", () => {
    it("stores a pending expense under the phase-scoped department key", async () => {
      const { expense, decision } = await service.submitExpense("project-1", member, request({ description: "Conduit" }));

      expect(decision.isAdmin).toBe(false);
      expect(expense.status).toBe("pending");
      expect(expense.department).toBe("phase-1_Electrical");
      expect(expense.phaseName).toBe("Foundations");
      expect(expense.date?.format()).toBe("15/06/2024");
      expect(expense.description).toBe("Conduit");
      expect(expense.submittedBy).toBe("member-1");
    });

    it("escalates against a degraded phase with its legacy budget", async () => {
      const { expense, decision } = await service.submitExpense(
        "project-1",
        member,
        request({ phaseId: "phase-2", department: "Civil", amount: 100 }),
      );

      expect(decision.reasons).toEqual(["department-figures-unavailable"]);
      expect(expense.isAdmin).toBe(true);
      expect(expense.department).toBe("phase-2_Civil");
    });

    it("rejects someone outside the project team", async () => {
      await expect(
        service.submitExpense("project-1", { id: "stranger", isAdmin: false }, request()),
      ).rejects.toMatchObject({ status: 403 });
    });

    it("rejects a date outside the phase timeline", async () => {
      await expect(service.submitExpense("project-1", member, request({ date: "01/07/2024" })))
        .rejects.toThrow("Expense date must fall within the phase timeline");
    });

    it("rejects a department the phase does not have", async () => {
      await expect(service.submitExpense("project-1", member, request({ department: "Roofing" })))
        .rejects.toThrow('Department "Roofing" does not exist in Foundations');
    });

    it("rejects a disabled phase", async () => {
      await expect(service.submitExpense("project-1", member, request({ phaseId: "phase-3" })))
        .rejects.toMatchObject({ status: 400 });
    });

    it("rejects an unknown project", async () => {
      await expect(service.submitExpense("project-9", member, request()))
        .rejects.toBeInstanceOf(ServiceError);
    });

    it("validates the request body", async () => {
      await expect(service.submitExpense("project-1", member, request({ amount: -5 })))
        .rejects.toBeInstanceOf(ZodError);
      expect(storage.writes).toEqual([]);
    });

    it("refuses amounts finer than a cent", async () => {
      await expect(service.submitExpense("project-1", member, request({ amount: 500.004 })))
        .rejects.toThrow("Amount cannot have more than two decimal places");
      await expect(service.submitExpense("project-1", member, request({ amount: 500.01 })))
        .resolves.toMatchObject({ decision: { isAdmin: true } });
    });
  });

  describe("deciding expenses", () => {
    beforeEach(() => {
      storage.seed({
        expenses: [
          buildExpense({ id: "pending-1", status: "pending", amount: 200, approvedBy: null }),
          buildExpense({ id: "pending-admin", status: "pending", amount: 900, isAdmin: true, approvedBy: null }),
        ],
      });
    });

    it("lets the manager approve a regular expense", async () => {
      const expense = await service.approveExpense("pending-1", manager, { remark: "ok" });

      expect(expense.status).toBe("approved");
      expect(expense.approvedBy).toBe("manager-1");
      expect(expense.remark).toBe("ok");
    });

    it("reserves escalated expenses for admins", async () => {
      await expect(service.approveExpense("pending-admin", manager, {})).rejects.toMatchObject({ status: 403 });

      const expense = await service.approveExpense("pending-admin", admin, {});
      expect(expense.approvedBy).toBe("admin-1");
    });

    it("records approvals made under an active delegation", async () => {
      storage.seed({
        projects: [buildProject({ tempApproverId: "delegate-1" })],
        tempApprovers: [buildTempApprover({
          status: "accepted",
          startDate: new Date(2024, 5, 10),
          endDate: new Date(2024, 5, 20),
        })],
      });

      await service.approveExpense("pending-1", { id: "delegate-1", isAdmin: false }, undefined);

      expect(storage.writes).toEqual(["decideExpense:approved", "recordDelegatedApproval"]);
      expect(storage.tempApprovers[0].approvedExpense).toEqual(["pending-1"]);
    });

    it("refuses a delegate whose delegation is still pending", async () => {
      storage.seed({
        projects: [buildProject({ tempApproverId: "delegate-1" })],
        tempApprovers: [buildTempApprover({ status: "pending", endDate: new Date(2024, 5, 20) })],
      });

      await expect(service.approveExpense("pending-1", { id: "delegate-1", isAdmin: false }, {}))
        .rejects.toMatchObject({ status: 403 });
    });

    it("refuses to decide an expense twice", async () => {
      await service.rejectExpense("pending-1", manager, { remark: "Duplicate receipt" });

      await expect(service.approveExpense("pending-1", manager, {}))
        .rejects.toThrow("Expense has already been rejected");
    });

    it("reports a missing expense", async () => {
      await expect(service.approveExpense("nope", manager, {})).rejects.toMatchObject({ status: 404 });
    });
  });
});
