import {
  AuthorizeSecurityGroupIngressCommand,
  DescribeSecurityGroupsCommand,
  EC2Client,
  RevokeSecurityGroupIngressCommand,
  type IpPermission,
} from "@aws-sdk/client-ec2";
import type {
  AuthorizeOutcome,
  CloudFirewallClient,
  FirewallProtocol,
  LiveRule,
  RevokeOutcome,
} from "@ingress-warden/shared";
import { z } from "zod";
import { ProviderQueryError, errorMessage } from "./errors";
import { createLogger, type Logger } from "./logger";

const DUPLICATE_RULE = "InvalidPermission.Duplicate";
const MISSING_RULE = "InvalidPermission.NotFound";

/**
 * Shape of DescribeSecurityGroups output the client relies on.
 * Anything else in the response is ignored.
 */
const describeResponseSchema = z.object({
  SecurityGroups: z.array(
    z.object({
      GroupId: z.string().optional(),
      IpPermissions: z
        .array(
          z.object({
            IpProtocol: z.string(),
            FromPort: z.number().int().optional(),
            ToPort: z.number().int().optional(),
            IpRanges: z.array(z.object({ CidrIp: z.string().optional() })).optional(),
          })
        )
        .optional(),
    })
  ),
});

function singlePortPermission(protocol: FirewallProtocol, port: number, cidr: string): IpPermission {
  return {
    IpProtocol: protocol,
    FromPort: port,
    ToPort: port,
    IpRanges: [{ CidrIp: cidr }],
  };
}

function errorName(error: unknown): string | undefined {
  return error instanceof Error ? error.name : undefined;
}

/**
 * CloudFirewallClient over EC2 security groups.
 *
 * Duplicate authorizations and revocations of absent rules are reported as
 * outcomes, not errors, so callers can treat both calls as idempotent.
 */
export class Ec2FirewallClient implements CloudFirewallClient {
  constructor(
    private readonly ec2: EC2Client,
    private readonly log: Logger = createLogger("ec2")
  ) {}

  /** Flattens every (port, CIDR) pair of the group's ingress permissions. */
  async listIngressRules(targetId: string): Promise<LiveRule[]> {
    let response: unknown;
    try {
      response = await this.ec2.send(new DescribeSecurityGroupsCommand({ GroupIds: [targetId] }));
    } catch (error) {
      throw new ProviderQueryError(targetId, errorMessage(error));
    }

    const parsed = describeResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw new ProviderQueryError(targetId, `malformed response: ${parsed.error.issues[0]?.message ?? "unknown"}`);
    }

    const group = parsed.data.SecurityGroups[0];
    if (!group) {
      throw new ProviderQueryError(targetId, "security group not found");
    }

    const rules: LiveRule[] = [];
    for (const permission of group.IpPermissions ?? []) {
      if (permission.FromPort === undefined) {
        continue;
      }
      for (const range of permission.IpRanges ?? []) {
        if (range.CidrIp) {
          rules.push({ port: permission.FromPort, protocol: permission.IpProtocol, cidr: range.CidrIp });
        }
      }
    }

    this.log.debug(`${targetId}: ${rules.length} ingress rule(s)`);
    return rules;
  }

  async authorizeIngress(
    targetId: string,
    protocol: FirewallProtocol,
    port: number,
    cidr: string
  ): Promise<AuthorizeOutcome> {
    try {
      await this.ec2.send(
        new AuthorizeSecurityGroupIngressCommand({
          GroupId: targetId,
          IpPermissions: [singlePortPermission(protocol, port, cidr)],
        })
      );
      return { status: "success" };
    } catch (error) {
      if (errorName(error) === DUPLICATE_RULE) {
        this.log.debug(`${targetId}: ${protocol}/${port} from ${cidr} already present`);
        return { status: "already-exists" };
      }
      return { status: "error", message: errorMessage(error) };
    }
  }

  async revokeIngress(
    targetId: string,
    protocol: FirewallProtocol,
    port: number,
    cidr: string
  ): Promise<RevokeOutcome> {
    try {
      const response = await this.ec2.send(
        new RevokeSecurityGroupIngressCommand({
          GroupId: targetId,
          IpPermissions: [singlePortPermission(protocol, port, cidr)],
        })
      );
      // EC2 may also answer an absent rule with success plus the unmatched permissions
      if (response.UnknownIpPermissions && response.UnknownIpPermissions.length > 0) {
        return { status: "not-found" };
      }
      return { status: "success" };
    } catch (error) {
      if (errorName(error) === MISSING_RULE) {
        this.log.debug(`${targetId}: ${protocol}/${port} from ${cidr} already absent`);
        return { status: "not-found" };
      }
      return { status: "error", message: errorMessage(error) };
    }
  }
}

export function createEc2FirewallClient(region: string, log?: Logger): Ec2FirewallClient {
  return new Ec2FirewallClient(new EC2Client({ region }), log);
}
