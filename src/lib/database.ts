import "reflect-metadata";
import config from "@/config";
import { DataSource } from "typeorm";
import { Comment } from "@/entities/Comment";
import { Like } from "@/entities/Like";
import { Post } from "@/entities/Post";
import { User } from "@/entities/User";
import { logger } from "@/utils/logger";

export const AppDataSource = new DataSource({
  type: "postgres",
  host: config.POSTGRES_HOST,
  port: config.POSTGRES_PORT,
  username: config.POSTGRES_USER,
  password: config.POSTGRES_PASSWORD,
  database: config.POSTGRES_DB,
  synchronize: config.NODE_ENV !== "production",
  logging: false,
  entities: [User, Post, Comment, Like],
  subscribers: [],
});

/**
 * Connect to database
 */
export async function connectDB(): Promise<void> {
  if (AppDataSource.isInitialized) return;
  try {
    await AppDataSource.initialize();
    logger.info("Postgres connected", { host: config.POSTGRES_HOST });
  } catch (error) {
    logger.error("Database connection failed", { error });
    throw error;
  }
}

export async function disconnectDB(): Promise<void> {
  if (!AppDataSource.isInitialized) return;
  await AppDataSource.destroy();
  logger.info("Postgres disconnected");
}

export async function isDatabaseReachable(): Promise<boolean> {
  if (!AppDataSource.isInitialized) return false;
  try {
    await AppDataSource.query("SELECT 1");
    return true;
  } catch (error) {
    logger.warn("Database readiness check failed", { error });
    return false;
  }
}
