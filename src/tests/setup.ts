import fs from "node:fs";
import os from "node:os";
import path from "node:path";

const PIPELINE_KEYS = [
  "LLM_BACKEND",
  "OPENAI_API_KEY",
  "GENAI_APP_URL",
  "GENAI_APP_TOKEN",
  "CACHE_BACKEND",
  "DATA_ROOT",
  "PROMPTS_DIR",
  "LOG_SCOPES",
  "LOG_FORMAT",
] as const;

const emptyDotenvPath = path.join(os.tmpdir(), "subtitle-story-vitest-empty.env");
if (!fs.existsSync(emptyDotenvPath)) {
  fs.writeFileSync(emptyDotenvPath, "", "utf8");
}

process.env.DOTENV_CONFIG_PATH = emptyDotenvPath;
process.env.DOTENV_CONFIG_OVERRIDE = "false";

for (const key of PIPELINE_KEYS) {
  if (process.env[key] !== undefined) {
    delete process.env[key];
  }
}

process.env.LOG_LEVEL = "error";
process.env.NODE_ENV = "test";
