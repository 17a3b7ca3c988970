import type { Express, RequestHandler } from "express";
import { actorOf } from "../identity";
import type { TempApproverService } from "../services/temp-approver-service";
import { sendRouteError } from "./route-errors";

interface TempApproverRouteDeps {
  requireActor: RequestHandler;
  tempApproverService: TempApproverService;
}

export function registerTempApproverRoutes(app: Express, deps: TempApproverRouteDeps) {
  const { tempApproverService } = deps;

  app.post("/api/projects/:projectId/temp-approver", deps.requireActor, async (req, res) => {
    try {
      const delegation = await tempApproverService.assign(req.params.projectId, actorOf(req), req.body);
      res.status(201).json(delegation);
    } catch (error) {
      sendRouteError(res, error, "TEMP_APPROVER", "Failed to assign temporary approver");
    }
  });

  app.post("/api/projects/:projectId/temp-approver/accept", deps.requireActor, async (req, res) => {
    try {
      res.json(await tempApproverService.accept(req.params.projectId, actorOf(req)));
    } catch (error) {
      sendRouteError(res, error, "TEMP_APPROVER", "Failed to accept delegation");
    }
  });

  app.post("/api/projects/:projectId/temp-approver/reject", deps.requireActor, async (req, res) => {
    try {
      res.json(await tempApproverService.reject(req.params.projectId, actorOf(req), req.body));
    } catch (error) {
      sendRouteError(res, error, "TEMP_APPROVER", "Failed to reject delegation");
    }
  });
}
