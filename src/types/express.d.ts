import "express-serve-static-core";
import type { Translator } from "@/translation/translator";

declare module "express-serve-static-core" {
  interface Request {
    /**
     * Parsed request parts. Populated by validate(schemas); controllers read
     * user input from here rather than from req.body/req.query.
     */
    validated?: {
      params: unknown;
      query: unknown;
      headers: unknown;
      body: unknown;
    };

    user?: {
      id: number;
    };
    // from requestContext middleware
    requestId?: string;
    locale?: string;
    translator?: Translator;
  }
}
