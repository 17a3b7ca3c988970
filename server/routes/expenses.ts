import type { Express, RequestHandler } from "express";
import { actorOf } from "../identity";
import type { ExpenseService } from "../services/expense-service";
import { sendRouteError } from "./route-errors";

interface ExpenseRouteDeps {
  requireActor: RequestHandler;
  expenseService: ExpenseService;
}

export function registerExpenseRoutes(app: Express, deps: ExpenseRouteDeps) {
  const { expenseService } = deps;

  app.post("/api/projects/:projectId/expenses/preview", deps.requireActor, async (req, res) => {
    try {
      const preview = await expenseService.previewExpense(req.params.projectId, req.body);
      res.json(preview);
    } catch (error) {
      sendRouteError(res, error, "EXPENSE_PREVIEW", "Failed to evaluate expense");
    }
  });

  app.post("/api/projects/:projectId/expenses", deps.requireActor, async (req, res) => {
    try {
      const submitted = await expenseService.submitExpense(req.params.projectId, actorOf(req), req.body);
      res.status(201).json(submitted);
    } catch (error) {
      sendRouteError(res, error, "EXPENSE_CREATE", "Failed to submit expense");
    }
  });

  app.post("/api/expenses/:expenseId/approve", deps.requireActor, async (req, res) => {
    try {
      res.json(await expenseService.approveExpense(req.params.expenseId, actorOf(req), req.body));
    } catch (error) {
      sendRouteError(res, error, "EXPENSE_DECISION", "Failed to approve expense");
    }
  });

  app.post("/api/expenses/:expenseId/reject", deps.requireActor, async (req, res) => {
    try {
      res.json(await expenseService.rejectExpense(req.params.expenseId, actorOf(req), req.body));
    } catch (error) {
      sendRouteError(res, error, "EXPENSE_DECISION", "Failed to reject expense");
    }
  });
}
