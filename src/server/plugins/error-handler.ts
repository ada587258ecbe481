/**
 * HTTP error types and the plugin that renders them as `ApiError` bodies
 */

import fp from "fastify-plugin";

import type { ApiError } from "../../types/api.js";
import type {
  FastifyInstance,
  FastifyError,
  FastifyRequest,
  FastifyReply,
} from "fastify";

// ============================================================================
// Error Classes
// ============================================================================

/** An error that maps straight onto an HTTP status and error code */
export abstract class HttpError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends HttpError {
  readonly code = "NOT_FOUND";
  readonly statusCode = 404;
}

export class ValidationError extends HttpError {
  readonly code = "VALIDATION_ERROR";
  readonly statusCode = 400;
}

/** A manual cluster with the same name already exists in the site */
export class ConflictError extends HttpError {
  readonly code = "CONFLICT";
  readonly statusCode = 409;
}

/** No synced data and no cache to fall back on */
export class NoDataError extends HttpError {
  readonly code = "NO_DATA";
  readonly statusCode = 503;
}

export class SyncError extends HttpError {
  readonly code = "SYNC_FAILED";
  readonly statusCode = 500;
}

// ============================================================================
// Plugin
// ============================================================================

function toApiError(
  request: FastifyRequest,
  error: string,
  message: string,
  details?: Record<string, unknown>
): ApiError {
  const body: ApiError = { error, message, requestId: request.id };
  if (details !== undefined) {
    body.details = details;
  }
  return body;
}

function errorHandlerPlugin(fastify: FastifyInstance): void {
  fastify.setErrorHandler(
    (error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
      if (error instanceof HttpError) {
        if (error.statusCode >= 500) {
          request.log.error({ err: error }, error.message);
        }
        return reply
          .status(error.statusCode)
          .send(toApiError(request, error.code, error.message, error.details));
      }

      if (error.validation !== undefined) {
        return reply.status(400).send(
          toApiError(request, "VALIDATION_ERROR", "Invalid request parameters", {
            validation: error.validation,
          })
        );
      }

      // Fastify's own client errors: bad JSON, unsupported content type, oversized body
      const status = error.statusCode;
      if (status !== undefined && status >= 400 && status < 500) {
        const code = status === 404 ? "NOT_FOUND" : "BAD_REQUEST";
        return reply
          .status(status)
          .send(toApiError(request, code, error.message || "Bad request"));
      }

      request.log.error({ err: error }, "Unhandled error");
      return reply
        .status(500)
        .send(toApiError(request, "INTERNAL_ERROR", "An unexpected error occurred"));
    }
  );

  fastify.setNotFoundHandler((request: FastifyRequest, reply: FastifyReply) =>
    reply
      .status(404)
      .send(
        toApiError(request, "NOT_FOUND", `Route ${request.method} ${request.url} not found`)
      )
  );
}

export const errorHandler = fp(errorHandlerPlugin, {
  name: "error-handler",
});
