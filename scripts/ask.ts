import "dotenv/config";

import { getModelConfig } from "../server/config/model";
import { CivicAssistant } from "../server/llm/assistant";

// Manual check: loads the model the server would load and answers one question.
// Usage: npm run ask -- "How do I renew my driver's license?"
async function runAsk() {
  const question = process.argv.slice(2).join(" ") || "How do I register to vote?";

  console.log(`[Ask] Question: ${question}`);
  console.log("---------------------------------------------------");

  const assistant = new CivicAssistant(getModelConfig());
  const startTime = Date.now();
  const loaded = await assistant.initializeModel();
  const status = assistant.getStatus();

  console.log(`[Ask] Model loaded: ${loaded}`);
  console.log(`[Ask] Model: ${status.modelId ?? "none"} (${status.role ?? "-"}, ${status.device ?? "-"})`);
  console.log(`[Ask] Init: ${Date.now() - startTime}ms`);

  const answerStart = Date.now();
  const answer = await assistant.generateResponse(question);

  console.log("\n=== ANSWER ===");
  console.log(answer);
  console.log(`\nDuration: ${Date.now() - answerStart}ms`);
}

runAsk().catch((error: unknown) => {
  console.error("[Ask] Error:", error);
  process.exitCode = 1;
});
