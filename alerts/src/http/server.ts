import express from "express";
import { notFoundHandler } from "./middleware";
import { AlertRoutes, RouteDeps } from "./routes";

export function createServer(deps: RouteDeps): express.Express {
  const app = express();
  app.use(express.json());
  app.use(new AlertRoutes(deps).getRouter());
  app.use(notFoundHandler());
  return app;
}
