import { resolve } from "node:path";
import { USAGE, parseCli } from "./cli";
import { loadConfig } from "./config";
import type { AppConfig } from "./config";
import { createLlmClient } from "./llm/client";
import { createLogger } from "./logger";
import { createMailgunSender } from "./newsletter/sender";
import {
  createPipelineStages,
  previewNewsletter,
  runNewsletter,
} from "./orchestrator";

async function main(): Promise<number> {
  const cli = parseCli(process.argv.slice(2));
  if (!cli.ok) {
    if (cli.error) {
      process.stderr.write(`${cli.error}\n`);
    }
    process.stdout.write(`${USAGE}\n`);
    return 1;
  }

  const logger = createLogger();

  const configPath = cli.configPath ?? process.env["CONFIG_PATH"];
  let config: AppConfig;
  try {
    config = loadConfig({
      env: process.env,
      configPath: configPath ? resolve(configPath) : undefined,
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(`Configuration Error: ${message}\n`);
    return 1;
  }

  logger.info(
    {
      mode: cli.mode,
      provider: config.llm.provider,
      model: config.llm.model,
      topics: config.newsletter.topics.length,
      recipients: config.email.recipients.length,
    },
    "config loaded",
  );

  const model = createLlmClient(config);
  const send = createMailgunSender(
    config.email.apiKey,
    config.email.domain,
    config.email.url,
  );
  const stages = createPipelineStages(config, model, send, logger);

  if (cli.mode === "preview") {
    await previewNewsletter(
      stages,
      {
        newsletterName: config.newsletter.name,
        write: (text) => process.stdout.write(text),
      },
      logger,
    );
    return 0;
  }

  const sent = await runNewsletter(stages, logger);
  return sent ? 0 : 1;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("fatal startup error:", err);
    process.exit(1);
  });
