import type { FastifyRequest, FastifyReply } from "fastify";
import { verifyToken } from "@shared/services/token.service.js";
import { AppError } from "@shared/errors/app-error.js";
import { ErrorCodes } from "@shared/errors/error-codes.js";
import { getUserById } from "@modules/identity/users.service.js";
import { can, type CapabilityType } from "@modules/identity/permissions.js";
import {
  guestContext,
  userContext,
  type CallerContext,
} from "@shared/types/context.js";
import type { AuthUser } from "@shared/types/fastify.js";

/**
 * Resolve the bearer token on a request to a user.
 * Returns null when no authorization header is present.
 */
async function authenticateRequest(
  request: FastifyRequest,
): Promise<AuthUser | null> {
  const authHeader = request.headers.authorization;

  if (authHeader === undefined) {
    return null;
  }

  if (!authHeader.startsWith("Bearer ")) {
    throw new AppError(
      "Missing or invalid authorization header",
      401,
      true,
      ErrorCodes.UNAUTHORIZED,
    );
  }

  const token = authHeader.slice("Bearer ".length);

  let userId: number;
  try {
    userId = verifyToken(token).userId;
  } catch {
    throw new AppError(
      "Invalid or expired token",
      401,
      true,
      ErrorCodes.INVALID_TOKEN,
    );
  }

  const user = await getUserById(userId);
  if (!user) {
    throw new AppError(
      "User not found in database",
      401,
      true,
      ErrorCodes.UNAUTHORIZED,
    );
  }

  return user;
}

/**
 * Middleware to require authentication.
 * Verifies the bearer token and attaches the user to the request.
 */
export async function requireAuth(
  request: FastifyRequest,
  _reply: FastifyReply,
): Promise<void> {
  const user = await authenticateRequest(request);

  if (!user) {
    throw new AppError(
      "Missing or invalid authorization header",
      401,
      true,
      ErrorCodes.UNAUTHORIZED,
    );
  }

  request.user = user;
}

/**
 * Middleware for routes open to guests. Attaches the user when a token is
 * sent; a bad token is still rejected.
 */
export async function optionalAuth(
  request: FastifyRequest,
  _reply: FastifyReply,
): Promise<void> {
  const user = await authenticateRequest(request);
  if (user) {
    request.user = user;
  }
}

/**
 * Factory for a middleware that requires the user's role to grant a
 * capability. Must run after requireAuth.
 */
export function requireCapability(capability: CapabilityType) {
  return async (
    request: FastifyRequest,
    _reply: FastifyReply,
  ): Promise<void> => {
    if (!request.user) {
      throw new AppError(
        "Authentication required",
        401,
        true,
        ErrorCodes.UNAUTHORIZED,
      );
    }

    if (!can(request.user.role, capability)) {
      throw new AppError(
        "Insufficient permissions",
        403,
        true,
        ErrorCodes.FORBIDDEN,
      );
    }
  };
}

/**
 * The authenticated user on a request behind requireAuth.
 */
export function getAuthUser(request: FastifyRequest): AuthUser {
  if (!request.user) {
    throw new AppError(
      "Authentication required",
      401,
      true,
      ErrorCodes.UNAUTHORIZED,
    );
  }
  return request.user;
}

/**
 * Explicit caller context handed to the core for this request.
 */
export function getCallerContext(request: FastifyRequest): CallerContext {
  return request.user
    ? userContext(request.id, request.user)
    : guestContext(request.id);
}
