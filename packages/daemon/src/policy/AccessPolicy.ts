import { promises as fs } from "node:fs";
import YAML from "yaml";
import { z } from "zod";
import {
  ConfigError,
  ENDPOINT_NAMES,
  PermissionDeniedError,
  errorMessage,
  type EndpointName,
} from "@clia/shared";
import type { Logger } from "@clia/core";

const EffectSchema = z.enum(["allow", "deny"]);
export type PolicyEffect = z.infer<typeof EffectSchema>;

const PolicyRuleSchema = z.object({
  effect: EffectSchema,
  uids: z.array(z.number().int().nonnegative()).optional(),
  gids: z.array(z.number().int().nonnegative()).optional(),
  endpoints: z.array(z.enum(ENDPOINT_NAMES)).optional(),
});
export type PolicyRule = z.infer<typeof PolicyRuleSchema>;

export const PolicyDocumentSchema = z.object({
  default: EffectSchema.default("allow"),
  rules: z.array(PolicyRuleSchema).default([]),
});
export type PolicyDocument = z.infer<typeof PolicyDocumentSchema>;

export interface CallerIdentity {
  uid: number;
  gids: number[];
}

export interface AccessDecision {
  allowed: boolean;
  /** Index of the deciding rule; undefined when the default applied. */
  rule?: number;
}

const ruleMatches = (rule: PolicyRule, caller: CallerIdentity, endpoint: EndpointName): boolean => {
  if (rule.endpoints && !rule.endpoints.includes(endpoint)) return false;
  if (!rule.uids && !rule.gids) return true;
  if (rule.uids?.includes(caller.uid)) return true;
  return rule.gids?.some((gid) => caller.gids.includes(gid)) ?? false;
};

/** A matching deny beats any allow; with no match the default applies. */
export const evaluatePolicy = (
  policy: PolicyDocument,
  caller: CallerIdentity,
  endpoint: EndpointName,
): AccessDecision => {
  const deny = policy.rules.findIndex((rule) => rule.effect === "deny" && ruleMatches(rule, caller, endpoint));
  if (deny >= 0) return { allowed: false, rule: deny };
  const allow = policy.rules.findIndex((rule) => rule.effect === "allow" && ruleMatches(rule, caller, endpoint));
  if (allow >= 0) return { allowed: true, rule: allow };
  return { allowed: policy.default === "allow" };
};

export class AccessPolicy {
  constructor(readonly document: PolicyDocument) {}

  static allowAll(): AccessPolicy {
    return new AccessPolicy({ default: "allow", rules: [] });
  }

  static parse(content: string, source = "policy"): AccessPolicy {
    let raw: unknown;
    try {
      raw = content.trim() ? YAML.parse(content) : {};
    } catch (error) {
      throw new ConfigError(`Could not parse access policy ${source}: ${errorMessage(error)}`, { path: source });
    }
    const parsed = PolicyDocumentSchema.safeParse(raw ?? {});
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; ");
      throw new ConfigError(`Invalid access policy ${source}: ${issues}`, { path: source });
    }
    return new AccessPolicy(parsed.data);
  }

  evaluate(caller: CallerIdentity, endpoint: EndpointName): AccessDecision {
    return evaluatePolicy(this.document, caller, endpoint);
  }

  check(caller: CallerIdentity, endpoint: EndpointName): void {
    const decision = this.evaluate(caller, endpoint);
    if (!decision.allowed) {
      throw new PermissionDeniedError(`Access to the ${endpoint} endpoint is denied.`, {
        endpoint,
        uid: caller.uid,
      });
    }
  }
}

export interface PolicySource {
  current(): Promise<AccessPolicy>;
}

export class StaticPolicySource implements PolicySource {
  constructor(private policy: AccessPolicy = AccessPolicy.allowAll()) {}

  async current(): Promise<AccessPolicy> {
    return this.policy;
  }
}

/**
 * Reads the policy file and re-reads it whenever its mtime changes, so edits
 * apply to the next call. A broken edit keeps the last good policy in force.
 */
export class FilePolicySource implements PolicySource {
  private loaded?: { mtimeMs: number; policy: AccessPolicy };

  constructor(
    readonly file: string,
    private logger?: Logger,
  ) {}

  async current(): Promise<AccessPolicy> {
    let mtimeMs: number;
    try {
      mtimeMs = (await fs.stat(this.file)).mtimeMs;
    } catch (error) {
      return this.keepOrFail(new ConfigError(`Access policy ${this.file} is unreadable: ${errorMessage(error)}`, {
        path: this.file,
      }));
    }
    if (this.loaded && this.loaded.mtimeMs === mtimeMs) return this.loaded.policy;
    try {
      const policy = AccessPolicy.parse(await fs.readFile(this.file, "utf8"), this.file);
      this.loaded = { mtimeMs, policy };
      this.logger?.info({ file: this.file, rules: policy.document.rules.length }, "access policy loaded");
      return policy;
    } catch (error) {
      return this.keepOrFail(error);
    }
  }

  private keepOrFail(error: unknown): AccessPolicy {
    if (!this.loaded) throw error;
    this.logger?.warn({ err: error, file: this.file }, "keeping previous access policy");
    return this.loaded.policy;
  }
}
