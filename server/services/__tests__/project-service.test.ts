import { describe, it, expect, beforeEach } from "vitest";
import { ZodError } from "zod";
import type { Actor } from "@shared/models";
import { ChangeNotifier } from "../change-notifier";
import { ProjectService } from "../project-service";
import { ReconciliationDriver } from "../reconciliation-driver";
import { FakeClock, MemoryStorage, buildDepartment, buildExpense, buildPhase, buildProject, day } from "./memory-storage";

describe("ProjectService", () => {
  let storage: MemoryStorage;
  let service: ProjectService;
  let clock: FakeClock;

  const admin: Actor = { id: "admin-1", isAdmin: true };

  beforeEach(() => {
    storage = new MemoryStorage();
    clock = new FakeClock(new Date(2024, 5, 15, 10));
    const notifier = new ChangeNotifier();
    service = new ProjectService(storage, new ReconciliationDriver(storage, notifier, clock), notifier, clock);
  });

  it("reconciles the project list before sorting it for display", async () => {
    storage.seed({
      projects: [
        buildProject({ id: "idle", status: "ACTIVE" }),
        buildProject({ id: "review", status: "IN_REVIEW" }),
        buildProject({ id: "done", status: "COMPLETED" }),
      ],
    });

    const projects = await service.listProjects();

    expect(projects.map(project => [project.id, project.status])).toEqual([
      ["review", "IN_REVIEW"],
      ["done", "COMPLETED"],
      ["idle", "STANDBY"],
    ]);
  });

  it("returns the reconciled project detail", async () => {
    storage.seed({
      projects: [buildProject({ status: "STANDBY" })],
      phases: [buildPhase({ startDate: day("15/06/2024") })],
    });

    expect((await service.getProject("project-1")).status).toBe("ACTIVE");
  });

  it("reports an unknown project", async () => {
    await expect(service.getProject("project-9")).rejects.toMatchObject({ status: 404 });
  });

  it("builds the phase report for a project", async () => {
    storage.seed({
      projects: [buildProject()],
      phases: [buildPhase()],
      departments: [buildDepartment({ budget: 2000 })],
      expenses: [buildExpense({ amount: 750 })],
    });

    const { project, report, events } = await service.getPhaseReport("project-1");

    expect(project.status).toBe("ACTIVE");
    expect(report.remaining).toBe(1250);
    expect(report.phases[0].departments[0].remaining).toBe(1250);
    expect(events).toEqual([]);
  });

  it("creates projects in review", async () => {
    const project = await service.createProject({
      name: "Harbour Offices",
      plannedDate: "01/09/2024",
      managerIds: ["manager-1"],
    });

    expect(project.status).toBe("IN_REVIEW");
    expect(project.plannedDate?.format()).toBe("01/09/2024");
    expect(project.teamMembers).toEqual([]);
  });

  it("refuses more than one manager", async () => {
    await expect(service.createProject({ name: "Two Heads", managerIds: ["a", "b"] })).rejects.toThrow();
  });

  it("carries on to the status pass once a suspension has lapsed", async () => {
    storage.seed({
      projects: [buildProject({
        status: "SUSPENDED",
        isSuspended: true,
        suspendedDate: day("13/06/2024"),
        plannedDate: day("01/06/2024"),
      })],
      phases: [buildPhase({ startDate: day("01/06/2024"), endDate: day("10/06/2024") })],
    });

    const [project] = await service.listProjects();

    expect(project.status).toBe("STANDBY");
    expect(project.isSuspended).toBe(false);
  });

  describe("suspension", () => {
    beforeEach(() => {
      storage.seed({
        projects: [buildProject({ plannedDate: day("01/06/2024") })],
        phases: [buildPhase({ startDate: day("01/06/2024"), endDate: null })],
      });
    });

    it("suspends a project until a date and resumes it once that date has passed", async () => {
      const suspended = await service.suspendProject("project-1", admin, {
        reason: "Permit review",
        suspendedUntil: "20/06/2024",
      });

      expect(suspended.status).toBe("SUSPENDED");
      expect(suspended.isSuspended).toBe(true);
      expect(suspended.suspendedDate?.format()).toBe("20/06/2024");
      expect(suspended.suspensionReason).toBe("Permit review");

      clock.set(new Date(2024, 5, 21, 9));
      const resumed = await service.getProject("project-1");

      expect(resumed.status).toBe("ACTIVE");
      expect(resumed.isSuspended).toBe(false);
    });

    it("is reserved for administrators", async () => {
      await expect(service.suspendProject("project-1", { id: "manager-1", isAdmin: false }, { reason: "Permit review" }))
        .rejects.toMatchObject({ status: 403 });
    });

    it("needs a reason", async () => {
      await expect(service.suspendProject("project-1", admin, { reason: "" })).rejects.toBeInstanceOf(ZodError);
    });

    it("refuses an end date in the past", async () => {
      await expect(service.suspendProject("project-1", admin, { reason: "Permit review", suspendedUntil: "14/06/2024" }))
        .rejects.toThrow("Suspension end date cannot be in the past");
      expect(storage.writes).toEqual([]);
    });

    it("refuses to suspend twice", async () => {
      await service.suspendProject("project-1", admin, { reason: "Permit review" });

      await expect(service.suspendProject("project-1", admin, { reason: "Again" }))
        .rejects.toThrow("Project is already suspended");
    });

    it("leaves closed projects alone", async () => {
      storage.seed({ projects: [buildProject({ id: "done", status: "COMPLETED" })] });

      await expect(service.suspendProject("done", admin, { reason: "Permit review" }))
        .rejects.toThrow("Project is COMPLETED and cannot be suspended");
    });

    it("resumes an open-ended suspension on request", async () => {
      await service.suspendProject("project-1", admin, { reason: "Permit review" });

      const resumed = await service.resumeProject("project-1", admin);

      expect(resumed.status).toBe("ACTIVE");
      expect(storage.writes).toEqual(["suspendProject", "unsuspendProject:ACTIVE"]);
    });

    it("reports a project that is not suspended", async () => {
      await expect(service.resumeProject("project-1", admin)).rejects.toThrow("Project is not suspended");
    });
  });
});
