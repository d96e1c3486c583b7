import { describe, it, expect, beforeEach, vi } from 'vitest';
import { HotReloadManager } from '../../core/registry/HotReloadManager.js';
import type { RegistrySnapshot } from '../../core/registry/RegistrySnapshot.js';
import { ValidationEngine } from '../../core/validation/ValidationEngine.js';
import type { IntentRecord, ValidationReport } from '../../core/intents/types.js';
import { RegistryBootstrapError, RegistryUnavailableError } from '../../utils/errors.js';
import { BENEFITS, CLAIMS, PHARMACY, TEST_SETTINGS } from '../fixtures/intents.js';

/** Publishes a competing version from inside validation to simulate a concurrent writer. */
class RacingValidator extends ValidationEngine {
  manager: HotReloadManager | null = null;
  races = 0;
  private racing = false;

  constructor(private readonly maxRaces: number) {
    super();
  }

  override validate(...args: Parameters<ValidationEngine['validate']>): ValidationReport {
    const manager = this.manager;
    if (manager && !this.racing && this.races < this.maxRaces) {
      this.races++;
      this.racing = true;
      manager.adopt(manager.current().records, manager.version + 1);
      this.racing = false;
    }
    return super.validate(...args);
  }
}

describe('HotReloadManager', () => {
  let manager: HotReloadManager;

  beforeEach(() => {
    manager = new HotReloadManager(new ValidationEngine(), TEST_SETTINGS);
  });

  describe('before bootstrap', () => {
    it('has no snapshot and version 0', () => {
      expect(manager.hasSnapshot()).toBe(false);
      expect(manager.version).toBe(0);
      expect(() => manager.current()).toThrow(RegistryUnavailableError);
    });

    it('refuses an invalid initial configuration', () => {
      let thrown: unknown;
      try {
        manager.bootstrap([]);
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(RegistryBootstrapError);
      if (thrown instanceof RegistryBootstrapError) {
        expect(thrown.report?.errors.map((error) => error.message)).toEqual([
          'The registry must contain at least one intent',
        ]);
      }
      expect(manager.hasSnapshot()).toBe(false);
    });
  });

  describe('staging and activation', () => {
    beforeEach(() => {
      manager.bootstrap([PHARMACY, BENEFITS]);
    });

    it('publishes a staged set as the next version', () => {
      const report = manager.stage([CLAIMS]);
      expect(report.valid).toBe(true);
      expect(manager.getStaged()?.baseVersion).toBe(1);

      const result = manager.activateStaged();

      expect(result).toEqual({ success: true, version: 2, report: null });
      expect(manager.current().records.map((record) => record.intentId)).toEqual(['INT-CLM-0001']);
      expect(manager.getStaged()).toBeNull();
    });

    it('fails a second activation without a new stage', () => {
      manager.stage([CLAIMS]);
      manager.activateStaged();

      const result = manager.activateStaged();

      expect(result.success).toBe(false);
      expect(result.version).toBe(2);
      expect(result.report?.errors[0]?.message).toBe('Nothing is staged; upload a configuration before reloading');
    });

    it('clears the staged slot when a stage is rejected', () => {
      manager.stage([CLAIMS]);
      const report = manager.stage([CLAIMS, { ...CLAIMS, intentName: 'claim_denied' }]);

      expect(report.errors).toEqual([
        { intentId: 'INT-CLM-0001', field: 'intent_id', message: 'Duplicate intent_id INT-CLM-0001 appears 2 times' },
      ]);
      expect(manager.getStaged()).toBeNull();
      expect(manager.activateStaged().success).toBe(false);
      expect(manager.version).toBe(1);
    });

    it('refuses a staged set that went stale', () => {
      manager.stage([CLAIMS]);
      manager.applyMerge({ ...BENEFITS, priority: 5 });

      const result = manager.activateStaged();

      expect(result.success).toBe(false);
      expect(result.version).toBe(2);
      expect(result.report?.errors[0]?.message).toBe(
        'Staged configuration was validated against version 1 but version 2 is now active; stage it again'
      );
      expect(manager.getStaged()).toBeNull();
      expect(manager.current().get('INT-PHR-0001')).toBeDefined();
    });
  });

  describe('merges', () => {
    beforeEach(() => {
      manager.bootstrap([PHARMACY, BENEFITS]);
    });

    it('replaces an existing intent in place', () => {
      const result = manager.applyMerge({ ...BENEFITS, priority: 5 });

      expect(result.success).toBe(true);
      expect(result.version).toBe(2);
      expect(manager.current().get('INT-BEN-0001')?.priority).toBe(5);
      expect(manager.current().records.map((record) => record.intentId)).toEqual(['INT-PHR-0001', 'INT-BEN-0001']);
    });

    it('appends a new intent', () => {
      manager.applyMerge(CLAIMS);
      expect(manager.current().size).toBe(3);
    });

    it('leaves the registry unchanged when a merge is invalid', () => {
      const result = manager.applyMerge({ ...CLAIMS, priority: 9 });

      expect(result.success).toBe(false);
      expect(result.failure).toBe('invalid');
      expect(result.version).toBe(1);
      expect(manager.current().get('INT-CLM-0001')).toBeUndefined();
    });

    it('removes an intent', () => {
      const result = manager.applyRemoval('INT-BEN-0001');

      expect(result.success).toBe(true);
      expect(manager.current().records.map((record) => record.intentId)).toEqual(['INT-PHR-0001']);
    });

    it('rejects removal of an unknown id', () => {
      const result = manager.applyRemoval('INT-XYZ-0001');

      expect(result.success).toBe(false);
      expect(result.report.errors[0]?.message).toBe('No intent with id INT-XYZ-0001 is registered');
      expect(manager.version).toBe(1);
    });

    it('never mutates a published snapshot', () => {
      const before = manager.current();
      manager.applyMerge({ ...BENEFITS, priority: 5 });

      expect(before.version).toBe(1);
      expect(before.get('INT-BEN-0001')?.priority).toBe(3);
      expect(Object.isFrozen(before)).toBe(true);
      expect(Object.isFrozen(before.records)).toBe(true);
    });
  });

  describe('concurrent publication', () => {
    function racingManager(maxRaces: number, attempts?: number): { manager: HotReloadManager; validator: RacingValidator } {
      const validator = new RacingValidator(maxRaces);
      const racing = new HotReloadManager(validator, TEST_SETTINGS, attempts);
      racing.bootstrap([PHARMACY, BENEFITS]);
      validator.manager = racing;
      return { manager: racing, validator };
    }

    it('retries a merge when another writer publishes first', () => {
      const { manager: racing, validator } = racingManager(1);

      const result = racing.applyMerge(CLAIMS);

      expect(validator.races).toBe(1);
      expect(result.success).toBe(true);
      expect(result.version).toBe(3);
      expect(racing.current().get('INT-CLM-0001')).toBeDefined();
    });

    it('gives up after the configured number of attempts', () => {
      const { manager: racing } = racingManager(Number.POSITIVE_INFINITY, 2);

      const result = racing.applyMerge(CLAIMS);

      expect(result.success).toBe(false);
      expect(result.failure).toBe('contention');
      expect(result.report.errors[0]?.message).toBe('Registry kept changing; merge abandoned after 2 attempts');
      expect(racing.current().get('INT-CLM-0001')).toBeUndefined();
    });
  });

  describe('store commit', () => {
    beforeEach(() => {
      manager.bootstrap([PHARMACY, BENEFITS]);
    });

    it('hands the new snapshot to the commit before publishing it', () => {
      const versionsAtCommit: number[] = [];
      const commit = vi.fn((snapshot: RegistrySnapshot) => {
        versionsAtCommit.push(manager.version);
        return snapshot.version === 2;
      });

      const result = manager.applyMerge(CLAIMS, commit);

      expect(result.success).toBe(true);
      expect(commit).toHaveBeenCalledTimes(1);
      expect(commit.mock.calls[0]?.[0].get('INT-CLM-0001')).toBeDefined();
      expect(versionsAtCommit).toEqual([1]);
      expect(manager.version).toBe(2);
    });

    it('publishes nothing when the store already holds a newer version', () => {
      const result = manager.applyRemoval('INT-BEN-0001', () => false);

      expect(result.success).toBe(false);
      expect(result.failure).toBe('store-conflict');
      expect(result.report.errors[0]?.message).toBe('The store already holds a version newer than 1');
      expect(manager.version).toBe(1);
      expect(manager.current().get('INT-BEN-0001')).toBeDefined();
    });

    it('keeps the staged set out when its commit is refused', () => {
      manager.stage([CLAIMS]);

      const result = manager.activateStaged(() => false);

      expect(result.success).toBe(false);
      expect(result.failure).toBe('stale');
      expect(result.report?.errors[0]?.message).toBe(
        'Staged configuration was validated against version 1 but the store already holds a newer version; stage it again'
      );
      expect(manager.current().get('INT-CLM-0001')).toBeUndefined();
      expect(manager.getStaged()).toBeNull();
    });

    it('does not publish when the commit throws', () => {
      expect(() =>
        manager.applyMerge(CLAIMS, () => {
          throw new Error('disk full');
        })
      ).toThrow('disk full');
      expect(manager.version).toBe(1);
    });
  });

  describe('adopt', () => {
    beforeEach(() => {
      manager.bootstrap([PHARMACY, BENEFITS]);
    });

    it('ignores versions that are not newer', () => {
      expect(manager.adopt([CLAIMS], 1)).toBeNull();
      expect(manager.current().get('INT-PHR-0001')).toBeDefined();
    });

    it('publishes a newer valid configuration under its own version', () => {
      const report = manager.adopt([CLAIMS], 7);

      expect(report?.valid).toBe(true);
      expect(manager.version).toBe(7);
    });

    it('keeps the active snapshot when the newer configuration is invalid', () => {
      const invalid: IntentRecord[] = [];
      const report = manager.adopt(invalid, 7);

      expect(report?.valid).toBe(false);
      expect(manager.version).toBe(1);
    });
  });

  describe('validateOnly', () => {
    beforeEach(() => {
      manager.bootstrap([PHARMACY, BENEFITS]);
    });

    it('validates the active configuration when given nothing', () => {
      expect(manager.validateOnly(null).valid).toBe(true);
    });

    it('validates candidates as a merge without publishing', () => {
      const report = manager.validateOnly([{ ...CLAIMS, intentId: 'INT-BEN-0002', category: 'benefits', intentName: 'explain_benefits' }], 'merge');

      expect(report.valid).toBe(false);
      expect(manager.version).toBe(1);
    });
  });
});
