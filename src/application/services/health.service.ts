import type { HealthCheck } from "../../core/ports/health-check.js";
import type { Logger } from "../../core/ports/logger.js";

export interface HealthStatus {
  readonly status: "ok" | "down";
  readonly version: string;
  readonly uptime: number;
  readonly timestamp: string;
  readonly checks: Record<string, ComponentHealth>;
}

export interface ComponentHealth {
  readonly status: "ok" | "down";
  readonly latencyMs?: number | undefined;
  readonly details?: string | undefined;
}

export interface HealthService {
  check(): Promise<HealthStatus>;
}

interface Deps {
  readonly logger: Logger;
  readonly version: string;
  /** Named components to ping, e.g. `{ database: store.health }` */
  readonly components: Readonly<Record<string, HealthCheck>>;
}

const elapsed = (start: number): number => Math.round((performance.now() - start) * 100) / 100;

export const createHealthService = (deps: Deps): HealthService => {
  const { logger, version, components } = deps;

  return {
    async check(): Promise<HealthStatus> {
      logger.debug("Running deep health check");

      const checks: Record<string, ComponentHealth> = {};
      await Promise.all(
        Object.entries(components).map(async ([name, component]) => {
          const start = performance.now();
          const pinged = await component.ping();
          checks[name] = pinged.ok
            ? { status: "ok", latencyMs: elapsed(start) }
            : { status: "down", latencyMs: elapsed(start), details: pinged.error.message };
        }),
      );

      const failed = Object.entries(checks)
        .filter(([, c]) => c.status === "down")
        .map(([name]) => name);

      if (failed.length > 0) {
        logger.warn("Health check failed", { failedComponents: failed.join(",") });
      }

      return {
        status: failed.length > 0 ? "down" : "ok",
        version,
        uptime: process.uptime(),
        timestamp: new Date().toISOString(),
        checks,
      };
    },
  };
};
