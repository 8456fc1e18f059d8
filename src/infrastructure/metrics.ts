/**
 * Prometheus-compatible metrics for observability
 * Provides both JSON metrics (/metrics) and Prometheus format (/metrics/prometheus)
 */
import type { FastifyPluginAsync } from "fastify";
import os from "os";
import {
  Counter,
  Histogram,
  Registry,
  collectDefaultMetrics,
} from "prom-client";

// Create a custom registry
export const metricsRegistry = new Registry();

// Add default Node.js metrics (memory, CPU, event loop, etc.)
collectDefaultMetrics({ register: metricsRegistry });

/**
 * Application-specific metrics
 */
export const metrics = {
  roomsCreated: new Counter({
    name: "rhythm_rooms_created_total",
    help: "Total number of rooms created",
    registers: [metricsRegistry],
  }),

  roomsDissolved: new Counter({
    name: "rhythm_rooms_dissolved_total",
    help: "Rooms removed, by reason",
    labelNames: ["reason"] as const, // host_left, last_member_left, inactivity
    registers: [metricsRegistry],
  }),

  joinOutcomes: new Counter({
    name: "rhythm_room_join_outcomes_total",
    help: "Join attempts by outcome",
    labelNames: ["outcome"] as const, // Ok, RoomFull, Disbanded, OtherError
    registers: [metricsRegistry],
  }),

  leaveOutcomes: new Counter({
    name: "rhythm_room_leave_outcomes_total",
    help: "Leave requests by outcome",
    labelNames: ["outcome"] as const,
    registers: [metricsRegistry],
  }),

  resultsSubmitted: new Counter({
    name: "rhythm_room_results_submitted_total",
    help: "Total number of play results submitted",
    registers: [metricsRegistry],
  }),

  lockTimeouts: new Counter({
    name: "rhythm_room_lock_timeouts_total",
    help: "Room row locks that could not be acquired within the lock timeout",
    registers: [metricsRegistry],
  }),

  requestsTotal: new Counter({
    name: "rhythm_http_requests_total",
    help: "Total number of API requests processed",
    labelNames: ["route", "status"] as const,
    registers: [metricsRegistry],
  }),

  requestLatency: new Histogram({
    name: "rhythm_http_request_latency_seconds",
    help: "API request processing latency in seconds",
    labelNames: ["route"] as const,
    buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
    registers: [metricsRegistry],
  }),
};

/**
 * Metrics Fastify routes plugin
 */
export const createMetricsRoutes = (): FastifyPluginAsync => {
  return async (fastify) => {
    // Prometheus format endpoint
    fastify.get("/metrics/prometheus", async (_request, reply) => {
      reply.header("Content-Type", metricsRegistry.contentType);
      return metricsRegistry.metrics();
    });

    // JSON format endpoint
    fastify.get("/metrics", async () => {
      const memoryUsage = process.memoryUsage();
      const [joins, dissolved] = await Promise.all([
        metrics.joinOutcomes.get(),
        metrics.roomsDissolved.get(),
      ]);

      return {
        system: {
          uptime: process.uptime(),
          memory: {
            rss: memoryUsage.rss,
            heapTotal: memoryUsage.heapTotal,
            heapUsed: memoryUsage.heapUsed,
          },
          loadAverage: os.loadavg(),
        },
        application: {
          joinOutcomes: Object.fromEntries(
            joins.values.map((v) => [String(v.labels.outcome), v.value]),
          ),
          roomsDissolved: Object.fromEntries(
            dissolved.values.map((v) => [String(v.labels.reason), v.value]),
          ),
        },
        timestamp: new Date().toISOString(),
      };
    });
  };
};
