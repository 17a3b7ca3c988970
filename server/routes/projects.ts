import type { Express, RequestHandler } from "express";
import { actorOf } from "../identity";
import type { ProjectService } from "../services/project-service";
import { sendRouteError } from "./route-errors";

interface ProjectRouteDeps {
  requireActor: RequestHandler;
  projectService: ProjectService;
}

export function registerProjectRoutes(app: Express, deps: ProjectRouteDeps) {
  const { projectService } = deps;

  app.get("/api/projects", async (_req, res) => {
    try {
      res.json(await projectService.listProjects());
    } catch (error) {
      sendRouteError(res, error, "PROJECTS", "Failed to fetch projects");
    }
  });

  app.post("/api/projects", deps.requireActor, async (req, res) => {
    try {
      const project = await projectService.createProject(req.body);
      res.status(201).json(project);
    } catch (error) {
      sendRouteError(res, error, "PROJECTS", "Failed to create project");
    }
  });

  app.get("/api/projects/:projectId", async (req, res) => {
    try {
      res.json(await projectService.getProject(req.params.projectId));
    } catch (error) {
      sendRouteError(res, error, "PROJECTS", "Failed to fetch project");
    }
  });

  app.post("/api/projects/:projectId/suspend", deps.requireActor, async (req, res) => {
    try {
      res.json(await projectService.suspendProject(req.params.projectId, actorOf(req), req.body));
    } catch (error) {
      sendRouteError(res, error, "PROJECTS", "Failed to suspend project");
    }
  });

  app.post("/api/projects/:projectId/resume", deps.requireActor, async (req, res) => {
    try {
      res.json(await projectService.resumeProject(req.params.projectId, actorOf(req)));
    } catch (error) {
      sendRouteError(res, error, "PROJECTS", "Failed to resume project");
    }
  });
}
