import client from "prom-client";

export const register = new client.Registry();

client.collectDefaultMetrics({ register });

export const translatedErrorsTotal = new client.Counter({
  name: "translated_errors_total",
  help: "Error messages rendered for API responses",
  labelNames: ["locale"],
  registers: [register],
});

export const httpRequestDuration = new client.Histogram({
  name: "http_request_duration_seconds",
  help: "HTTP request latency",
  buckets: [0.1, 0.3, 0.5, 1, 2, 5],
  labelNames: ["method", "route", "status"],
  registers: [register],
});
