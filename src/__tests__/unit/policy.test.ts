/**
 * Unit tests for mode policies and the policy registry.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { PolicyConfigurationError } from '../../exceptions';
import { MODE_PRESETS, parsePolicy, retentionThreshold } from '../../policy';
import { defaultPolicyRegistry, PolicyRegistry, resolvePolicy } from '../../registry';
import { EntitySource, PIIType } from '../../types';

describe('parsePolicy', () => {
  it('fills defaults and freezes the policy', () => {
    const policy = parsePolicy({
      name: 'custom',
      base_threshold: 0.6,
      aggressive_regex: true,
      afn_passes: 'single',
      accept_invalid_checksum: false,
    });

    expect(policy.aggressive_regex).toBe('on');
    expect(policy.afn_trigger_below).toBe(2);
    expect(policy.afn_confidence).toBe(0.75);
    expect(policy.excluded_types).toEqual([PIIType.ORG]);
    expect(policy.scoring.context_window).toBe(50);
    expect(Object.isFrozen(policy)).toBe(true);
    expect(Object.isFrozen(policy.scoring)).toBe(true);
  });

  it('maps false to the formatted-only matchers', () => {
    const policy = parsePolicy({
      name: 'plain',
      base_threshold: 0.6,
      aggressive_regex: false,
      afn_passes: 'none',
      accept_invalid_checksum: false,
    });
    expect(policy.aggressive_regex).toBe('off');
  });

  it('rejects a threshold outside (0, 1) with the failing path', () => {
    expect(() =>
      parsePolicy({
        name: 'broken',
        base_threshold: 1.5,
        aggressive_regex: 'on',
        afn_passes: 'single',
        accept_invalid_checksum: false,
      })
    ).toThrow(/^Invalid mode policy: base_threshold: /);
  });

  it('rejects unknown keys', () => {
    try {
      parsePolicy({ ...MODE_PRESETS[0], extra: 1 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(PolicyConfigurationError);
      expect(error instanceof PolicyConfigurationError && error.issues[0]?.code).toBe('unrecognized_keys');
    }
  });
});

describe('MODE_PRESETS', () => {
  it('orders thresholds from strict to precise', () => {
    expect(MODE_PRESETS.map((policy) => [policy.name, policy.base_threshold])).toEqual([
      ['strict', 0.5],
      ['balanced', 0.7],
      ['precise', 0.85],
    ]);
  });

  it('lets strict escalate on every text', () => {
    expect(MODE_PRESETS[0].afn_trigger_below).toBeNull();
    expect(MODE_PRESETS[0].afn_passes).toBe('double');
  });
});

describe('retentionThreshold', () => {
  it('halves the threshold for recovered entities', () => {
    const balanced = resolvePolicy('balanced');
    expect(retentionThreshold(balanced, new Set<EntitySource>(['regex']))).toBe(0.7);
    expect(retentionThreshold(balanced, new Set<EntitySource>(['regex', 'afn']))).toBe(0.35);
  });
});

describe('PolicyRegistry', () => {
  let registry: PolicyRegistry;

  beforeEach(() => {
    registry = new PolicyRegistry();
  });

  it('registers and replaces policies by name', () => {
    registry.register({ ...MODE_PRESETS[1], name: 'custom' }, 'first');
    registry.register({ ...MODE_PRESETS[1], name: 'custom', base_threshold: 0.8 }, 'second');

    expect(registry.size()).toBe(1);
    expect(registry.get('custom')?.base_threshold).toBe(0.8);
    expect(registry.metadata()[0].description).toBe('second');
  });

  it('removes policies', () => {
    registry.register({ ...MODE_PRESETS[2], name: 'temp' });
    expect(registry.remove('temp')).toBe(true);
    expect(registry.has('temp')).toBe(false);
  });

  it('names the known modes when a lookup fails', () => {
    registry.register({ ...MODE_PRESETS[0], name: 'only' });
    expect(() => registry.require('missing')).toThrow("Unknown mode 'missing'. Known modes: only");
  });
});

describe('defaultPolicyRegistry', () => {
  it('holds the presets with descriptions', () => {
    expect(defaultPolicyRegistry.metadata().map((mode) => [mode.name, mode.aggressiveRegex, mode.afnPasses])).toEqual([
      ['strict', 'on', 'double'],
      ['balanced', 'partial', 'single'],
      ['precise', 'off', 'none'],
    ]);
    expect(defaultPolicyRegistry.metadata()[1].description).toBe('Default trade-off between recall and precision');
  });
});

describe('resolvePolicy', () => {
  it('resolves names and records', () => {
    expect(resolvePolicy('precise').name).toBe('precise');
    expect(resolvePolicy({ ...MODE_PRESETS[0], name: 'mine' }).name).toBe('mine');
  });

  it('rejects unknown names', () => {
    expect(() => resolvePolicy('paranoid')).toThrow(PolicyConfigurationError);
  });
});
