import { z } from "zod";
import { ConfigurationMissingError } from "./errors";
import { parseEnvText, readEnvFile } from "./env-file";

const configSchema = z.object({
  /** "1" is an AWS EC2 deployment; other strategies have no security groups to manage. */
  DEPLOYMENT_STRATEGY: z.string().default("1"),

  /** Region of every security group in the run. Required for strategy 1. */
  AWS_REGION: z.string().min(1).optional(),

  /** Security group of the GPU inference instance. */
  SECURITY_GROUP_ID: z.string().min(1).optional(),

  /** Security group of the build box running the WebSocket bridge. */
  BUILDBOX_SECURITY_GROUP: z.string().min(1).optional(),

  /** Comma-separated port overrides and their parallel labels. */
  GPU_SG_PORTS: z.string().optional(),
  GPU_SG_PORT_DESCRIPTIONS: z.string().optional(),
  BUILDBOX_SG_PORTS: z.string().optional(),
  BUILDBOX_SG_PORT_DESCRIPTIONS: z.string().optional(),
  BUILDBOX_SG_PUBLIC_PORTS: z.string().optional(),

  /** Public address of the GPU instance, offered as an authorized entry. */
  GPU_INSTANCE_IP: z.string().optional(),

  /** Public address of the build box, shown in the next-steps hint. */
  BUILDBOX_PUBLIC_IP: z.string().optional(),

  /** HTTP port of the inference server's health endpoint. */
  RIVA_HTTP_PORT: z
    .string()
    .default("8000")
    .transform((v) => parseInt(v, 10))
    .pipe(z.number().int().min(1).max(65535)),

  /** Console verbosity; the deployment scripts write it upper-case. */
  LOG_LEVEL: z
    .string()
    .default("info")
    .transform((v) => v.toLowerCase())
    .pipe(z.enum(["debug", "info", "warn", "error"])),
});

export type DeploymentConfig = z.infer<typeof configSchema>;

/**
 * Validate the raw key/value pairs of a deployment configuration file.
 * Empty values count as absent.
 */
export function parseConfig(raw: Record<string, string | undefined>): DeploymentConfig {
  const present = Object.fromEntries(
    Object.entries(raw).filter(([, value]) => value !== undefined && value.trim() !== "")
  );

  const result = configSchema.safeParse(present);
  if (!result.success) {
    const formatted = result.error.issues
      .map((i) => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ConfigurationMissingError(
      String(result.error.issues[0]?.path[0] ?? "config"),
      `Configuration validation failed:\n${formatted}`
    );
  }
  return result.data;
}

/**
 * Read and validate the configuration file at `path`.
 * Throws ConfigurationMissingError when it does not exist.
 */
export async function loadConfig(path: string): Promise<DeploymentConfig> {
  const text = await readEnvFile(path);
  if (text === null) {
    throw new ConfigurationMissingError(path, `Configuration file not found: ${path}`);
  }
  return parseConfig(parseEnvText(text));
}

export function isEc2Deployment(config: DeploymentConfig): boolean {
  return config.DEPLOYMENT_STRATEGY === "1";
}

export function requireRegion(config: DeploymentConfig): string {
  if (!config.AWS_REGION) {
    throw new ConfigurationMissingError("AWS_REGION", "AWS_REGION is not set in the configuration file");
  }
  return config.AWS_REGION;
}
