import "reflect-metadata"; // MUST be first

import type { Server } from "http";
import { createApp } from "@/app";
import config from "@/config";
import { createPostContext } from "@/contexts/posts";
import { ownPosts } from "@/contexts/scopes";
import { createUserContext } from "@/contexts/users";
import {
  AppDataSource,
  connectDB,
  disconnectDB,
  isDatabaseReachable,
} from "@/lib/database";
import { defineResolvers } from "@/resolvers/defineResolvers";
import { crudRouter } from "@/routes/crud.route";
import { createCatalogTranslator, loadCatalogs } from "@/translation/catalog";
import { logger } from "@/utils/logger";

async function main() {
  await connectDB();

  const translator = await createCatalogTranslator(
    loadCatalogs(config.LOCALES_DIR),
  );

  const app = createApp({
    translator,
    isReady: isDatabaseReachable,
    routers: {
      users: crudRouter(
        defineResolvers(createUserContext(AppDataSource), "user", {
          listQuery: { take: 100 },
        }),
      ),
      posts: crudRouter(
        defineResolvers(createPostContext(AppDataSource), "post", {
          listQuery: { take: 100 },
          scope: ownPosts,
        }),
      ),
    },
  });

  const server = app.listen(config.PORT, () => {
    logger.info(`Server running on port ${config.PORT}`, {
      defaultLocale: config.DEFAULT_LOCALE,
      locales: translator.locales,
    });
  });

  attachShutdown(server);
}

function attachShutdown(server: Server) {
  let shuttingDown = false;

  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutdown started", { signal });

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    await disconnectDB();

    logger.info("Shutdown complete");
  };

  const onSignal = (signal: string) => {
    shutdown(signal).then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error("Shutdown failed", { error });
        process.exit(1);
      },
    );
  };

  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((error: unknown) => {
  logger.error("Startup failed", { error });
  process.exit(1);
});
