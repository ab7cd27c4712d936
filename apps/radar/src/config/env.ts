import * as dotenv from "dotenv";
import * as Joi from "joi";

dotenv.config();
type INodeEnv = "development" | "production" | "staging" | "test";

interface EnvVars {
  NODE_ENV: INodeEnv;
  PORT: number;
  REDDIT_USER_AGENT: string;
  REDDIT_CLIENT_ID: string;
  REDDIT_CLIENT_SECRET: string;
  REDDIT_USERNAME: string;
  REDDIT_PASSWORD: string;
  REDDIT_REQUEST_TIMEOUT_MS: number;
  REDDIT_REQUEST_DELAY_MS: number;
  REDDIT_MAX_CONCURRENT: number;
  REDDIT_MIN_TIME_MS: number;
  REDDIT_REQUESTS_PER_MINUTE: number;
  KEYWORD_WEIGHT: number;
  SCORE_WEIGHT: number;
  COMMENT_WEIGHT: number;
  PROBLEM_THRESHOLD: number;
  TAXONOMY_FILE?: string;
  MAX_LIMIT: number;
}

const redditCredential = Joi.string().when("NODE_ENV", {
  is: "test",
  then: Joi.string().default("test"),
  otherwise: Joi.string().required(),
});

// Define validation schema for environment variables
const envSchema = Joi.object<EnvVars>()
  .keys({
    NODE_ENV: Joi.string()
      .valid("development", "production", "staging", "test")
      .required(),
    PORT: Joi.number().port().default(3000),

    REDDIT_USER_AGENT: Joi.string().default("problem-radar/1.0"),
    REDDIT_CLIENT_ID: redditCredential,
    REDDIT_CLIENT_SECRET: redditCredential,
    REDDIT_USERNAME: redditCredential,
    REDDIT_PASSWORD: redditCredential,

    // Reddit client & rate limiting
    REDDIT_REQUEST_TIMEOUT_MS: Joi.number().integer().min(1000).default(30000),
    REDDIT_REQUEST_DELAY_MS: Joi.number().integer().min(0).default(50),
    REDDIT_MAX_CONCURRENT: Joi.number().integer().min(1).default(4),
    REDDIT_MIN_TIME_MS: Joi.number().integer().min(0).default(100),
    REDDIT_REQUESTS_PER_MINUTE: Joi.number().integer().min(1).default(600),

    // Scoring
    KEYWORD_WEIGHT: Joi.number().min(0).default(2.0),
    SCORE_WEIGHT: Joi.number().min(0).default(0.5),
    COMMENT_WEIGHT: Joi.number().min(0).default(0.3),
    PROBLEM_THRESHOLD: Joi.number().min(0).default(2.0),
    TAXONOMY_FILE: Joi.string(),

    // Limits
    MAX_LIMIT: Joi.number().integer().min(1).default(100),
  })
  .unknown();

// Validate environment variables against the schema
const validation = envSchema
  .prefs({ errors: { label: "key" } })
  .validate(process.env);

// Throw an error if validation fails
if (validation.error) {
  throw new Error(`Config validation error: ${validation.error.message}`);
}
const validatedEnvVars = validation.value;

export const config = Object.freeze({
  app: {
    environment: validatedEnvVars.NODE_ENV,
    port: validatedEnvVars.PORT,
  },

  reddit: {
    userAgent: validatedEnvVars.REDDIT_USER_AGENT,
    clientId: validatedEnvVars.REDDIT_CLIENT_ID,
    clientSecret: validatedEnvVars.REDDIT_CLIENT_SECRET,
    userName: validatedEnvVars.REDDIT_USERNAME,
    password: validatedEnvVars.REDDIT_PASSWORD,
    requestTimeoutMs: validatedEnvVars.REDDIT_REQUEST_TIMEOUT_MS,
    requestDelayMs: validatedEnvVars.REDDIT_REQUEST_DELAY_MS,
  },

  rateLimit: {
    maxConcurrent: validatedEnvVars.REDDIT_MAX_CONCURRENT,
    minTime: validatedEnvVars.REDDIT_MIN_TIME_MS,
    requestsPerMinute: validatedEnvVars.REDDIT_REQUESTS_PER_MINUTE,
  },

  scoring: {
    weights: {
      keyword: validatedEnvVars.KEYWORD_WEIGHT,
      score: validatedEnvVars.SCORE_WEIGHT,
      comments: validatedEnvVars.COMMENT_WEIGHT,
    },
    problemThreshold: validatedEnvVars.PROBLEM_THRESHOLD,
    taxonomyFile: validatedEnvVars.TAXONOMY_FILE,
  },

  limits: {
    max: validatedEnvVars.MAX_LIMIT,
    search: 20,
    subreddit: 50,
    trending: 30,
    trendingMinScore: 10,
    trendingMinComments: 5,
    commentLimit: 20,
    postsPerQuery: 10,
  },
});

export type AppConfig = typeof config;
export type ToolLimits = AppConfig["limits"];
