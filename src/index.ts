import "dotenv/config";
import { runGmpSummary } from "@/cron/send-gmp-summary";
import { loadConfig } from "@/lib/config";

async function main(): Promise<void> {
  const config = await loadConfig();
  await runGmpSummary(config);
}

main().catch((error: unknown) => {
  console.error("gmp-mailer: run failed:", error);
  process.exitCode = 1;
});
