import type { Request, Response, NextFunction } from "express";

export const USER_HEADER = "x-user-id";

// Extend Express Request type with the caller identity
declare global {
  namespace Express {
    interface Request {
      userId?: string;
    }
  }
}

/**
 * Identity is established by the gateway in front of this service; we only
 * read the header it forwards.
 */
export function requireUser(req: Request, res: Response, next: NextFunction) {
  const userId = req.get(USER_HEADER)?.trim();
  if (!userId) {
    return res.status(401).json({ message: "Caller identity required" });
  }

  req.userId = userId;
  next();
}

export function currentUser(req: Request): string {
  if (!req.userId) {
    throw new Error("requireUser middleware is not mounted on this route");
  }
  return req.userId;
}
