import type { Request, Response, NextFunction } from "express";
import { unauthorizedError } from "../errors.js";

declare global {
  namespace Express {
    interface Request {
      githubToken?: string;
    }
  }
}

// githubTokenMiddleware takes the caller's GitHub token from the bearer
// header. The token is only forwarded upstream, never verified or stored here.
export function githubTokenMiddleware() {
  return (req: Request, _res: Response, next: NextFunction) => {
    const header = req.headers.authorization;
    if (!header) {
      return next(unauthorizedError("Missing GitHub token"));
    }

    const parts = header.split(" ");
    if (parts.length !== 2 || parts[0].toLowerCase() !== "bearer" || !parts[1]) {
      return next(unauthorizedError("Invalid auth header format"));
    }

    req.githubToken = parts[1];
    next();
  };
}
