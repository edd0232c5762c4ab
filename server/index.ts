import "dotenv/config";

import { createApp, listen } from "./app";
import { getEnvConfig, validateEnv } from "./config/env";
import { getModelConfig } from "./config/model";
import { ensureAdminExists } from "./init-admin";
import { CivicAssistant, initializeAssistant } from "./llm/assistant";
import { createStorage } from "./storage";
import { describeError, logError } from "./utils/logger";

async function main(): Promise<void> {
  // Validate environment variables before anything else
  validateEnv();
  const env = getEnvConfig();
  const modelConfig = getModelConfig();

  const storage = createStorage(env.DATABASE_URL);
  await ensureAdminExists(storage, {
    username: env.PORTAL_ADMIN_USERNAME,
    password: env.PORTAL_ADMIN_PASSWORD,
  });

  // The model is resolved before the first request is accepted
  const assistant = new CivicAssistant(modelConfig);
  await initializeAssistant(assistant);

  const { server } = await createApp({ storage, assistant });
  await listen(server, env.PORT);
}

main().catch((error: unknown) => {
  logError("startup_failed", { error: describeError(error) });
  process.exit(1);
});
