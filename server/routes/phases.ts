import type { Express, RequestHandler } from "express";
import { actorOf } from "../identity";
import type { PhaseService } from "../services/phase-service";
import type { ProjectService } from "../services/project-service";
import { sendRouteError } from "./route-errors";

interface PhaseRouteDeps {
  requireActor: RequestHandler;
  projectService: ProjectService;
  phaseService: PhaseService;
}

export function registerPhaseRoutes(app: Express, deps: PhaseRouteDeps) {
  const { projectService, phaseService } = deps;

  // Budget figures per phase and department, after reconciling the project
  app.get("/api/projects/:projectId/phases", async (req, res) => {
    try {
      const { project, report, events } = await projectService.getPhaseReport(req.params.projectId);
      res.json({
        project,
        report,
        warnings: events.map(event => event.kind),
      });
    } catch (error) {
      sendRouteError(res, error, "PHASES", "Failed to fetch phase budgets");
    }
  });

  app.post("/api/projects/:projectId/phases", deps.requireActor, async (req, res) => {
    try {
      const phase = await phaseService.createPhase(req.params.projectId, actorOf(req), req.body);
      res.status(201).json(phase);
    } catch (error) {
      sendRouteError(res, error, "PHASES", "Failed to create phase");
    }
  });

  app.delete("/api/projects/:projectId/phases/:phaseId", deps.requireActor, async (req, res) => {
    try {
      await phaseService.deletePhase(req.params.projectId, req.params.phaseId, actorOf(req));
      res.status(204).send();
    } catch (error) {
      sendRouteError(res, error, "PHASES", "Failed to delete phase");
    }
  });

  app.post("/api/projects/:projectId/phases/:phaseId/departments", deps.requireActor, async (req, res) => {
    try {
      const department = await phaseService.createDepartment(
        req.params.projectId,
        req.params.phaseId,
        actorOf(req),
        req.body,
      );
      res.status(201).json(department);
    } catch (error) {
      sendRouteError(res, error, "PHASES", "Failed to create department");
    }
  });

  app.patch("/api/projects/:projectId/phases/:phaseId", deps.requireActor, async (req, res) => {
    try {
      const phase = await phaseService.updatePhase(req.params.projectId, req.params.phaseId, actorOf(req), req.body);
      res.json(phase);
    } catch (error) {
      sendRouteError(res, error, "PHASES", "Failed to update phase");
    }
  });

  app.get("/api/projects/:projectId/phases/:phaseId/timeline-changes", async (req, res) => {
    try {
      res.json(await phaseService.listTimelineChanges(req.params.projectId, req.params.phaseId));
    } catch (error) {
      sendRouteError(res, error, "PHASES", "Failed to fetch timeline changes");
    }
  });

  // Phase extension requests
  app.post("/api/projects/:projectId/phases/:phaseId/extension-requests", deps.requireActor, async (req, res) => {
    try {
      const request = await phaseService.requestExtension(
        req.params.projectId,
        req.params.phaseId,
        actorOf(req),
        req.body,
      );
      res.status(201).json(request);
    } catch (error) {
      sendRouteError(res, error, "PHASES", "Failed to submit extension request");
    }
  });

  app.get("/api/projects/:projectId/extension-requests", async (req, res) => {
    try {
      res.json(await phaseService.listPhaseRequests(req.params.projectId, req.query.status));
    } catch (error) {
      sendRouteError(res, error, "PHASES", "Failed to fetch extension requests");
    }
  });

  app.post("/api/extension-requests/:requestId/accept", deps.requireActor, async (req, res) => {
    try {
      res.json(await phaseService.acceptPhaseRequest(req.params.requestId, actorOf(req), req.body));
    } catch (error) {
      sendRouteError(res, error, "PHASES", "Failed to accept extension request");
    }
  });

  app.post("/api/extension-requests/:requestId/reject", deps.requireActor, async (req, res) => {
    try {
      res.json(await phaseService.rejectPhaseRequest(req.params.requestId, actorOf(req), req.body));
    } catch (error) {
      sendRouteError(res, error, "PHASES", "Failed to reject extension request");
    }
  });
}
