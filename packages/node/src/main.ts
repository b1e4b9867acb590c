/**
 * @authvault/node: Entry point.
 *
 * Loads config, deploys the ledger and vault, and writes the
 * deployment summary.
 */

import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { deploy, writeDeploymentSummary } from "./deploy.js";
import { InMemoryFundsTransport } from "./transport.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);

  const { summary } = await deploy(config, {
    logger,
    transport: new InMemoryFundsTransport(),
  });

  await writeDeploymentSummary(config.DEPLOYMENT_FILE, summary);
  logger.info(
    { file: config.DEPLOYMENT_FILE, summary },
    "Deployment summary written",
  );
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Deployment failed:", err);
  process.exit(1);
});
