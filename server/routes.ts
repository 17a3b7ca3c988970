import type { Express } from "express";
import type { IStorage } from "./storage";
import { requireActor } from "./identity";
import { changeNotifier as defaultNotifier, type ChangeNotifier } from "./services/change-notifier";
import { systemClock, type Clock } from "./services/clock";
import { ExpenseService } from "./services/expense-service";
import { PhaseService } from "./services/phase-service";
import { ProjectService } from "./services/project-service";
import { ReconciliationDriver } from "./services/reconciliation-driver";
import { TempApproverService } from "./services/temp-approver-service";
import { registerExpenseRoutes } from "./routes/expenses";
import { registerPhaseRoutes } from "./routes/phases";
import { registerProjectRoutes } from "./routes/projects";
import { registerTempApproverRoutes } from "./routes/temp-approvers";

export interface RouteOptions {
  storage?: IStorage;
  notifier?: ChangeNotifier;
  clock?: Clock;
}

export async function registerRoutes(app: Express, options: RouteOptions = {}): Promise<void> {
  // The database-backed store is only loaded when none is supplied
  const storage = options.storage ?? (await import("./storage")).storage;
  const notifier = options.notifier ?? defaultNotifier;
  const clock = options.clock ?? systemClock;

  const reconciler = new ReconciliationDriver(storage, notifier, clock);
  const projectService = new ProjectService(storage, reconciler, notifier, clock);
  const phaseService = new PhaseService(storage, notifier, clock);
  const expenseService = new ExpenseService(storage, reconciler, notifier, clock);
  const tempApproverService = new TempApproverService(storage, notifier, clock);

  registerProjectRoutes(app, { requireActor, projectService });
  registerPhaseRoutes(app, { requireActor, projectService, phaseService });
  registerExpenseRoutes(app, { requireActor, expenseService });
  registerTempApproverRoutes(app, { requireActor, tempApproverService });
}
