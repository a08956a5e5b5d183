#!/usr/bin/env -S npx tsx
import { buildProgram } from "./cli";
import { runConfigure } from "./commands/configure";
import { createEc2FirewallClient } from "./lib/ec2-client";
import {
  ConfigurationMissingError,
  ProviderQueryError,
  ValidationError,
} from "./lib/errors";
import { detectPublicIp } from "./services/public-ip";
import { createReadlinePrompt, type PromptPolicy } from "./services/session";

const noPrompt: PromptPolicy = (question) =>
  Promise.reject(new ValidationError(question, `Cannot ask "${question}" in non-interactive mode`));

// Top-level handler: known errors print with their tag, anything else as unhandled
function reportError(error: unknown): void {
  if (error instanceof ConfigurationMissingError) {
    console.error(`[config] ${error.message}`);
  } else if (error instanceof ValidationError) {
    console.error(`[validation] ${error.message}`);
  } else if (error instanceof ProviderQueryError) {
    console.error(`[provider] ${error.message}`);
  } else {
    console.error("[unhandled-error]", error);
  }
}

const program = buildProgram(async (options) => {
  const terminal = options.nonInteractive ? null : createReadlinePrompt();
  try {
    const result = await runConfigure(options, {
      createClient: createEc2FirewallClient,
      prompt: terminal?.prompt ?? noPrompt,
      detectPublicIp,
    });
    process.exitCode = result.exitCode;
  } finally {
    terminal?.close();
  }
});

program.parseAsync(process.argv).catch((error: unknown) => {
  reportError(error);
  process.exitCode = 1;
});
