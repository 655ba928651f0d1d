import { describe, it, expect } from 'vitest';
import { getConfig } from '../../src/config/config';

describe('config', () => {
  it('should default to degrading owner lookups', () => {
    expect(getConfig({})).toEqual({
      defaultNamespace: undefined,
      context: undefined,
      ownerLookupFailure: 'degrade'
    });
  });

  it('should read values from the environment', () => {
    const config = getConfig({
      K8S_AUDIT_NAMESPACE: 'shop',
      K8S_AUDIT_CONTEXT: 'prod',
      K8S_AUDIT_OWNER_LOOKUP: 'abort'
    });

    expect(config).toEqual({ defaultNamespace: 'shop', context: 'prod', ownerLookupFailure: 'abort' });
  });

  it('should treat empty values as unset', () => {
    expect(getConfig({ K8S_AUDIT_CONTEXT: '', K8S_AUDIT_OWNER_LOOKUP: '' }).context).toBeUndefined();
  });

  it('should reject an unknown owner lookup policy', () => {
    expect(() => getConfig({ K8S_AUDIT_OWNER_LOOKUP: 'ignore' })).toThrow(/^Invalid configuration: K8S_AUDIT_OWNER_LOOKUP/);
  });
});
