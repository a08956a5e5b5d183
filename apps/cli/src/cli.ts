import { Command } from "commander";
import { z } from "zod";
import type { ConfigureOptions } from "./commands/configure";
import { ValidationError } from "./lib/errors";
import { DEFAULT_READY_TIMEOUT_S } from "./services/health-check";

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const optionsSchema = z.object({
  gpu: z.boolean().optional(),
  buildbox: z.boolean().optional(),
  group: z.string().min(1).optional(),
  ports: z.string().min(1).optional(),
  publicPorts: z.string().optional(),
  envFile: z.string().min(1),
  nonInteractive: z.boolean().optional(),
  ip: z.array(z.string()).default([]),
  remove: z.array(z.string()).default([]),
  waitReady: z
    .union([z.literal(true), z.string().regex(/^\d+$/, "expected a number of seconds")])
    .optional()
    .transform((v) => (v === undefined ? undefined : v === true ? DEFAULT_READY_TIMEOUT_S : parseInt(v, 10))),
});

/**
 * Validate commander's parsed option bag into ConfigureOptions.
 */
export function toConfigureOptions(raw: Record<string, unknown>): ConfigureOptions {
  const result = optionsSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const flag = String(issue?.path[0] ?? "options");
    throw new ValidationError(flag, `Invalid --${flag}: ${issue?.message ?? "invalid value"}`);
  }

  const options = result.data;
  if (options.group && !options.ports) {
    throw new ValidationError("group", "--group needs --ports (e.g. --ports 22:SSH,443:HTTPS)");
  }
  if (!options.group && (options.ports || options.publicPorts)) {
    throw new ValidationError("ports", "--ports and --public-ports only apply together with --group");
  }
  if (!options.nonInteractive && (options.ip.length > 0 || options.remove.length > 0)) {
    throw new ValidationError("ip", "--ip and --remove require --non-interactive");
  }
  return options;
}

export function buildProgram(run: (options: ConfigureOptions) => Promise<void>): Command {
  return new Command()
    .name("ingress-warden")
    .description(
      "Configure EC2 security group ingress rules for the ASR deployment.\n" +
        "With no target flag, every security group set in the configuration file is configured."
    )
    .option("--gpu", "configure the GPU instance security group")
    .option("--buildbox", "configure the build box security group")
    .option("--group <id>", "configure an additional security group by id")
    .option("--ports <specs>", "ports of --group as port:description pairs, comma separated")
    .option("--public-ports <ports>", "ports of --group to open to 0.0.0.0/0, comma separated")
    .option("--env-file <path>", "deployment configuration file", ".env")
    .option("--non-interactive", "do not prompt; use --ip and --remove")
    .option("--ip <address[=description]>", "address to authorize (repeatable)", collect, [])
    .option("--remove <address>", "address to revoke from every port (repeatable)", collect, [])
    .option("--wait-ready [seconds]", `wait for the GPU inference server to report ready (default ${DEFAULT_READY_TIMEOUT_S}s)`)
    .action(async (opts: Record<string, unknown>) => {
      await run(toConfigureOptions(opts));
    });
}
