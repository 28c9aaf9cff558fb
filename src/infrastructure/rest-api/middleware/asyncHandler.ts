import type { NextFunction, Request, RequestHandler, Response } from "express";

export const asyncHandler =
	(handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
	(req: Request, res: Response, next: NextFunction) => {
		handler(req, res).catch(next);
	};

export const actorOf = (req: Request): string => req.header("x-user-id") ?? "system";
