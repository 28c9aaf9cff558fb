import { type Request, type Response, Router } from "express";

export class HealthController {
	public routes(): Router {
		const router = Router();
		router.get("/health", (req, res) => this.healthCheckpoint(req, res));
		return router;
	}

	private healthCheckpoint(_req: Request, res: Response): void {
		res.status(200).json({ status: "ok", timestamp: new Date().toISOString() });
	}
}
