import { z } from 'zod';
import type { OwnerLookupFailurePolicy } from '../types/sources';

export interface AppConfig {
  // Used when neither --namespaces nor --all-namespaces is given and the kubeconfig context sets none
  defaultNamespace?: string | undefined;
  context?: string | undefined;
  ownerLookupFailure: OwnerLookupFailurePolicy;
}

const envSchema = z.object({
  K8S_AUDIT_NAMESPACE: z.string().min(1).optional(),
  K8S_AUDIT_CONTEXT: z.string().min(1).optional(),
  K8S_AUDIT_OWNER_LOOKUP: z.enum(['degrade', 'abort']).default('degrade')
});

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === '' ? undefined : value;
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse({
    K8S_AUDIT_NAMESPACE: emptyToUndefined(env.K8S_AUDIT_NAMESPACE),
    K8S_AUDIT_CONTEXT: emptyToUndefined(env.K8S_AUDIT_CONTEXT),
    K8S_AUDIT_OWNER_LOOKUP: emptyToUndefined(env.K8S_AUDIT_OWNER_LOOKUP)
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  return {
    defaultNamespace: parsed.data.K8S_AUDIT_NAMESPACE,
    context: parsed.data.K8S_AUDIT_CONTEXT,
    ownerLookupFailure: parsed.data.K8S_AUDIT_OWNER_LOOKUP
  };
}
