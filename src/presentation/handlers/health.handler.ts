import type { HealthService } from "../../application/services/health.service.js";

/**
 * Health handler with two modes:
 * - Deep check: pings the store (for /readiness)
 * - Shallow check: pre-serialized instant response (for /health and load balancer probes)
 */
export const healthHandler = (healthService: HealthService) => {
  const shallowHeaders = { "Content-Type": "application/json; charset=utf-8" };

  const deepCheck = async (): Promise<Response> => {
    const status = await healthService.check();
    const httpCode = status.status === "ok" ? 200 : 503;
    return Response.json(status, { status: httpCode });
  };

  const shallowCheck = (): Response => {
    const body = `{"status":"ok","timestamp":"${new Date().toISOString()}"}`;
    return new Response(body, { status: 200, headers: shallowHeaders });
  };

  return { deepCheck, shallowCheck };
};
