import { config, engineConfig } from "./config";
import { logger } from "./lib/logger";
import { redditClient } from "./lib/redditClient";
import { createApp } from "./server";
import { AnalysisService } from "./services/analysis.service";
import { ProblemEngine } from "./services/engine.service";
import { RedditService } from "./services/reddit.service";
import { ToolRouter } from "./tools/router";

const bootstrap = () => {
  const redditService = new RedditService(redditClient, config.rateLimit);
  const engine = new ProblemEngine(engineConfig);
  const router = new ToolRouter(
    new AnalysisService(redditService, engine),
    config.limits
  );

  const port = config.app.port;
  createApp(router).listen(port, () => {
    logger.info(`🚀 Problem radar API running on port ${port}`);
    logger.info(`Environment: ${config.app.environment}`);
    logger.info(
      `Taxonomy: ${engine.matcher.categories.join(", ")} | threshold ${engineConfig.problemThreshold}`
    );
    logger.info(`Available endpoints:`);
    logger.info(`  GET  /health - Health check`);
    logger.info(`  GET  /api/tools - List analysis tools`);
    logger.info(`  POST /api/tools/:name - Run an analysis tool`);
  });
};

if (config.app.environment !== "test") {
  bootstrap();
}
