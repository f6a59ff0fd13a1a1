import { FastifyError, FastifyReply, FastifyRequest } from "fastify";

import { RateLimitError, formatError } from "@/utils/errors";
import { componentLogger } from "@/utils/logger";

const log = componentLogger("http");

export function errorHandler(error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply) {
  const formatted = formatError(error, request.id);
  const { statusCode, code } = formatted.error;
  const meta = { requestId: request.id, method: request.method, url: request.url, code };

  if (statusCode >= 500) {
    log.error("Request failed with server error", { ...meta, error });
  } else {
    log.warn("Request rejected", { ...meta, message: formatted.error.message });
  }

  if (error instanceof RateLimitError) {
    reply.header("retry-after", String(error.retryAfterSeconds));
  }

  if (!reply.sent) {
    reply.status(statusCode).send(formatted);
  }
}
