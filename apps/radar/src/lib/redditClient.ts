import { config } from "@/config";
import Snoowrap from "snoowrap";

const redditClient = new Snoowrap({
  userAgent: config.reddit.userAgent,
  clientId: config.reddit.clientId,
  clientSecret: config.reddit.clientSecret,
  username: config.reddit.userName,
  password: config.reddit.password,
});

redditClient.config({
  requestDelay: config.reddit.requestDelayMs,
  requestTimeout: config.reddit.requestTimeoutMs,
  continueAfterRatelimitError: false,
});

export { redditClient };
