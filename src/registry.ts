/**
 * Registry of named mode policies.
 *
 * The registry is the catalog `resolvePolicy` looks names up in. The three
 * presets are registered at load time; adding a mode is a `register` call
 * with a policy record, not a new code path.
 */

import { PolicyConfigurationError } from './exceptions';
import { MODE_PRESETS, ModePolicy, ModePolicyInput, parsePolicy } from './policy';

/**
 * Metadata snapshot for a registered policy, for listings and help output.
 */
export interface PolicyMetadata {
  name: string;
  description: string;
  baseThreshold: number;
  aggressiveRegex: ModePolicy['aggressive_regex'];
  afnPasses: ModePolicy['afn_passes'];
  acceptInvalidChecksum: boolean;
}

const PRESET_DESCRIPTIONS: Record<string, string> = {
  strict: 'Favors recall: low threshold, every matcher, double anti-false-negative pass',
  balanced: 'Default trade-off between recall and precision',
  precise: 'Favors precision: formatted identifiers only, no escalation',
};

/**
 * In-memory catalog of mode policies keyed by name.
 */
export class PolicyRegistry {
  private policies = new Map<string, ModePolicy>();
  private descriptions = new Map<string, string>();

  /**
   * Validate and register a policy. A policy with the same name is replaced.
   *
   * @returns The validated, frozen policy.
   * @throws {PolicyConfigurationError} When the record is invalid.
   */
  register(policy: ModePolicyInput | ModePolicy, description: string = ''): ModePolicy {
    const parsed = parsePolicy(policy);
    this.policies.set(parsed.name, parsed);
    this.descriptions.set(parsed.name, description);
    return parsed;
  }

  get(name: string): ModePolicy | undefined {
    return this.policies.get(name);
  }

  /**
   * Look up a policy, failing when the name is unknown.
   *
   * @throws {PolicyConfigurationError} When no policy has that name.
   */
  require(name: string): ModePolicy {
    const policy = this.policies.get(name);
    if (!policy) {
      const known = Array.from(this.policies.keys()).join(', ');
      throw new PolicyConfigurationError(`Unknown mode '${name}'. Known modes: ${known}`);
    }
    return policy;
  }

  remove(name: string): boolean {
    this.descriptions.delete(name);
    return this.policies.delete(name);
  }

  has(name: string): boolean {
    return this.policies.has(name);
  }

  size(): number {
    return this.policies.size;
  }

  /**
   * All registered policies, in registration order.
   */
  all(): ModePolicy[] {
    return Array.from(this.policies.values());
  }

  metadata(): PolicyMetadata[] {
    return this.all().map((policy) => ({
      name: policy.name,
      description: this.descriptions.get(policy.name) ?? '',
      baseThreshold: policy.base_threshold,
      aggressiveRegex: policy.aggressive_regex,
      afnPasses: policy.afn_passes,
      acceptInvalidChecksum: policy.accept_invalid_checksum,
    }));
  }
}

/**
 * Default registry, holding the `strict`, `balanced` and `precise` presets.
 */
export const defaultPolicyRegistry = new PolicyRegistry();

for (const preset of MODE_PRESETS) {
  defaultPolicyRegistry.register(preset, PRESET_DESCRIPTIONS[preset.name]);
}

/**
 * Resolve a mode name or a custom policy record into a validated policy.
 *
 * @throws {PolicyConfigurationError} For unknown names and invalid records.
 */
export function resolvePolicy(
  mode: string | ModePolicyInput | ModePolicy,
  registry: PolicyRegistry = defaultPolicyRegistry
): ModePolicy {
  if (typeof mode === 'string') {
    return registry.require(mode);
  }
  return parsePolicy(mode);
}
