import { config } from "@/config/env";
import { AppLogger, buildDevLogger, prodDevLogger } from "./loggings";

const baseLogger =
  config.app.environment === "production"
    ? prodDevLogger()
    : buildDevLogger(config.app.environment === "test");

export const logger = new AppLogger(baseLogger, "problem-radar");
