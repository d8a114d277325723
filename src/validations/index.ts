import type { z } from "zod";

export type RequestPartSchemas = {
  body?: z.ZodType;
  query?: z.ZodType;
  params?: z.ZodType;
  headers?: z.ZodType;
};

export * from "./validator";
export * from "./toValidationNode";
