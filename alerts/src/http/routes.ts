import crypto from "crypto";
import { PriceHistoryTracker, summarizePriceHistory, type ListingsRepo } from "@autoscout/listings";
import { Logger } from "@autoscout/shared-utils";
import { Request, Response, Router } from "express";
import { AlertTester } from "../core/alert-test";
import { validateCriteria } from "../core/criteria";
import { Alert } from "../core/dto";
import { AlertsRepo } from "../core/ports";
import { NotificationStatusTracker } from "../core/status";
import {
  AlertCreateBody,
  AlertTestBody,
  AlertUpdateBody,
  MarkReadBody,
  schemas,
  sendError,
  StatusUpdateBody,
  validateBody,
} from "./middleware";

export type RouteDeps = {
  repo: AlertsRepo;
  listings: Pick<ListingsRepo, "getById" | "listPriceHistory">;
  tester: AlertTester;
  tracker: NotificationStatusTracker;
  logger: Logger;
  healthCheck?: () => Promise<boolean>;
  now?: () => string;
};

export class AlertRoutes {
  private router: Router;
  private now: () => string;
  private priceHistory: PriceHistoryTracker;

  constructor(private deps: RouteDeps) {
    this.router = Router();
    this.now = deps.now ?? (() => new Date().toISOString());
    this.priceHistory = new PriceHistoryTracker(deps.listings);
    this.setupRoutes();
  }

  getRouter(): Router {
    return this.router;
  }

  private setupRoutes(): void {
    this.router.get("/healthz", this.handleHealthCheck.bind(this));

    // ===== Alerts =====

    this.router.post(
      "/alerts/test",
      validateBody(schemas.alertTest),
      this.handleAlertTest.bind(this)
    );
    this.router.post(
      "/alerts",
      validateBody(schemas.alertCreate),
      this.handleCreateAlert.bind(this)
    );
    this.router.get("/alerts", this.handleListAlerts.bind(this));
    this.router.get("/alerts/stats/summary", this.handleAlertStats.bind(this));
    this.router.get("/alerts/:id", this.handleGetAlert.bind(this));
    this.router.put(
      "/alerts/:id",
      validateBody(schemas.alertUpdate),
      this.handleUpdateAlert.bind(this)
    );
    this.router.post("/alerts/:id/toggle", this.handleToggleAlert.bind(this));
    this.router.delete("/alerts/:id", this.handleDeleteAlert.bind(this));
    this.router.get("/alerts/:id/notifications", this.handleListNotifications.bind(this));

    // ===== Listings =====

    this.router.get("/listings/:id/price-history", this.handlePriceHistory.bind(this));

    // ===== Notifications =====

    // delivery callback
    this.router.post(
      "/notifications/:id/status",
      validateBody(schemas.statusUpdate),
      this.handleStatusUpdate.bind(this)
    );
    this.router.patch(
      "/notifications/:id/read",
      validateBody(schemas.markRead),
      this.handleMarkRead.bind(this)
    );
  }

  private async handleHealthCheck(req: Request, res: Response): Promise<void> {
    try {
      const healthy = this.deps.healthCheck ? await this.deps.healthCheck() : true;
      res.status(healthy ? 200 : 503).json({ ok: healthy, timestamp: this.now() });
    } catch (error) {
      this.deps.logger.error("Health check failed:", error);
      res.status(503).json({ ok: false, timestamp: this.now() });
    }
  }

  private async handleAlertTest(req: Request, res: Response): Promise<void> {
    try {
      const body: AlertTestBody = req.body;
      const result = await this.deps.tester.run(body.criteria, this.now());
      res.json(result);
    } catch (error) {
      sendError(res, error, this.deps.logger);
    }
  }

  private async handleCreateAlert(req: Request, res: Response): Promise<void> {
    try {
      const body: AlertCreateBody = req.body;
      const now = this.now();
      const alert: Alert = {
        id: crypto.randomUUID(),
        userId: body.userId,
        name: body.name,
        criteria: validateCriteria(body.criteria),
        isActive: body.isActive,
        frequency: body.frequency,
        maxNotificationsPerDay: body.maxNotificationsPerDay,
        triggerCount: 0,
        createdAt: now,
        updatedAt: now,
      };
      res.status(201).json(await this.deps.repo.saveAlert(alert));
    } catch (error) {
      sendError(res, error, this.deps.logger);
    }
  }

  private async handleListAlerts(req: Request, res: Response): Promise<void> {
    try {
      const { userId, activeOnly } = schemas.alertListQuery.parse(req.query);
      const alerts = await this.deps.repo.listAlerts(userId);
      res.json({ alerts: activeOnly ? alerts.filter((a) => a.isActive) : alerts });
    } catch (error) {
      sendError(res, error, this.deps.logger);
    }
  }

  private async handleAlertStats(req: Request, res: Response): Promise<void> {
    try {
      const { userId } = schemas.alertListQuery.parse(req.query);
      const alerts = await this.deps.repo.listAlerts(userId);
      const active = alerts.filter((a) => a.isActive).length;
      res.json({ total: alerts.length, active, inactive: alerts.length - active });
    } catch (error) {
      sendError(res, error, this.deps.logger);
    }
  }

  private async handleGetAlert(req: Request, res: Response): Promise<void> {
    try {
      const alert = await this.deps.repo.getAlert(req.params.id);
      if (alert) res.json(alert);
      else this.alertNotFound(res, req.params.id);
    } catch (error) {
      sendError(res, error, this.deps.logger);
    }
  }

  // Partial update; criteria go through the same validation as on create
  private async handleUpdateAlert(req: Request, res: Response): Promise<void> {
    try {
      const body: AlertUpdateBody = req.body;
      const current = await this.deps.repo.getAlert(req.params.id);
      if (!current) {
        this.alertNotFound(res, req.params.id);
        return;
      }

      const updated: Alert = {
        ...current,
        name: body.name ?? current.name,
        criteria: body.criteria === undefined ? current.criteria : validateCriteria(body.criteria),
        frequency: body.frequency ?? current.frequency,
        maxNotificationsPerDay: body.maxNotificationsPerDay ?? current.maxNotificationsPerDay,
        isActive: body.isActive ?? current.isActive,
        updatedAt: this.now(),
      };
      res.json(await this.deps.repo.saveAlert(updated));
    } catch (error) {
      sendError(res, error, this.deps.logger);
    }
  }

  private async handleToggleAlert(req: Request, res: Response): Promise<void> {
    try {
      const current = await this.deps.repo.getAlert(req.params.id);
      if (!current) {
        this.alertNotFound(res, req.params.id);
        return;
      }
      res.json(
        await this.deps.repo.saveAlert({
          ...current,
          isActive: !current.isActive,
          updatedAt: this.now(),
        })
      );
    } catch (error) {
      sendError(res, error, this.deps.logger);
    }
  }

  private async handleDeleteAlert(req: Request, res: Response): Promise<void> {
    try {
      const deleted = await this.deps.repo.deleteAlert(req.params.id);
      if (deleted) res.status(204).end();
      else this.alertNotFound(res, req.params.id);
    } catch (error) {
      sendError(res, error, this.deps.logger);
    }
  }

  private async handleListNotifications(req: Request, res: Response): Promise<void> {
    try {
      const { limit } = schemas.listQuery.parse(req.query);
      const notifications = await this.deps.repo.listNotificationsForAlert(req.params.id, limit);
      res.json({ notifications });
    } catch (error) {
      sendError(res, error, this.deps.logger);
    }
  }

  private async handlePriceHistory(req: Request, res: Response): Promise<void> {
    try {
      const { days } = schemas.priceHistoryQuery.parse(req.query);
      const listing = await this.deps.listings.getById(req.params.id);
      if (!listing) {
        res.status(404).json({ error: `Listing ${req.params.id} not found` });
        return;
      }

      const since =
        days === undefined
          ? undefined
          : new Date(Date.parse(this.now()) - days * 86_400_000).toISOString();
      const history = await this.priceHistory.history(listing.id, since);
      res.json({
        listingId: listing.id,
        currentPrice: listing.price,
        history,
        summary: summarizePriceHistory(history),
      });
    } catch (error) {
      sendError(res, error, this.deps.logger);
    }
  }

  private async handleStatusUpdate(req: Request, res: Response): Promise<void> {
    try {
      const body: StatusUpdateBody = req.body;
      const updated = await this.deps.tracker.apply({
        notificationId: req.params.id,
        status: body.status,
        errorMessage: body.errorMessage,
        retryCount: body.retryCount,
        occurredAt: body.occurredAt ?? this.now(),
      });
      res.json(updated);
    } catch (error) {
      sendError(res, error, this.deps.logger);
    }
  }

  private async handleMarkRead(req: Request, res: Response): Promise<void> {
    try {
      const body: MarkReadBody = req.body;
      res.json(await this.deps.tracker.markRead(req.params.id, body.isRead));
    } catch (error) {
      sendError(res, error, this.deps.logger);
    }
  }

  private alertNotFound(res: Response, id: string): void {
    res.status(404).json({ error: `Alert ${id} not found` });
  }
}
