import type { CorsOptions } from "cors";

export const corsOptions: CorsOptions = {
  methods: ["GET", "POST"],
  allowedHeaders: ["Content-Type"],
};
