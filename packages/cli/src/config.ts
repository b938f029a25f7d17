/**
 * CLI configuration
 *
 * Read from the environment, with command-line flags taking precedence.
 */

import { z } from "zod";
import { CloneError, ServicePrincipalConfig } from "@azvmclone/cloning";

export const DEFAULT_CREATED_BY = "azvmclone";

const optionalValue = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const configSchema = z.object({
  subscriptionId: optionalValue.pipe(
    z.string().uuid({ message: "Subscription ID must be a GUID" }).optional()
  ),
  tenantId: optionalValue,
  clientId: optionalValue,
  clientSecret: optionalValue,
  createdBy: optionalValue,
});

export interface AzvmcloneConfig {
  subscriptionId?: string;
  servicePrincipal: ServicePrincipalConfig;
  /** Value of the createdBy tag on every resource a clone creates */
  createdBy: string;
}

export interface ConfigOverrides {
  subscriptionId?: string;
}

/**
 * Build the configuration from environment variables and flag overrides.
 *
 * @throws CloneError with kind "PreconditionFailed" when a value is malformed
 */
export function loadConfig(
  env: NodeJS.ProcessEnv,
  overrides: ConfigOverrides = {}
): AzvmcloneConfig {
  const parsed = configSchema.safeParse({
    subscriptionId: overrides.subscriptionId ?? env.AZURE_SUBSCRIPTION_ID,
    tenantId: env.AZURE_TENANT_ID,
    clientId: env.AZURE_CLIENT_ID,
    clientSecret: env.AZURE_CLIENT_SECRET,
    createdBy: env.AZVMCLONE_CREATED_BY,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new CloneError("PreconditionFailed", `Invalid configuration: ${issues}`);
  }

  const { subscriptionId, tenantId, clientId, clientSecret, createdBy } = parsed.data;
  return {
    subscriptionId,
    servicePrincipal: { tenantId, clientId, clientSecret },
    createdBy: createdBy || env.USER || env.USERNAME || DEFAULT_CREATED_BY,
  };
}

export function usesServicePrincipal(config: AzvmcloneConfig): boolean {
  const { tenantId, clientId, clientSecret } = config.servicePrincipal;
  return Boolean(tenantId && clientId && clientSecret);
}

/**
 * Some but not all service principal variables are set; the default
 * credential chain is used in that case.
 */
export function hasPartialServicePrincipal(config: AzvmcloneConfig): boolean {
  const { tenantId, clientId, clientSecret } = config.servicePrincipal;
  const set = [tenantId, clientId, clientSecret].filter(Boolean).length;
  return set > 0 && set < 3;
}
