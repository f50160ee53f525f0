/**
 * Tests for the repair decision and save handling
 */

import { describe, it, expect, beforeEach } from 'vitest';
import * as fc from 'fast-check';
import { RepairDecider, shouldRepair, type RepairOptions } from './repair-decider.js';
import { RunStats } from './run-stats.js';
import { Logger, LogLevel } from '../../core/logger.js';
import { CHECKSUM_TYPES, type Checksum } from '../../models/types.js';
import type { Datastream } from '../../models/repository.js';
import { FakeRepository, makeRecord, single, type ObjectSpec } from '../../test-helpers.js';

const silent = new Logger({ level: LogLevel.SILENT });

const checksumArb: fc.Arbitrary<Checksum> = fc.oneof(
  fc.constant<Checksum>({ state: 'disabled' }),
  fc.constantFrom(...CHECKSUM_TYPES).map((type): Checksum => ({ state: 'unrecorded', type })),
  fc.constantFrom(...CHECKSUM_TYPES).map((type): Checksum => ({ state: 'recorded', type, value: 'abc123' }))
);

const dsidArb = fc.constantFrom('DC', 'RELS-EXT', 'MASTER', 'THUMB');

function options(overrides: Partial<RepairOptions> = {}): RepairOptions {
  return {
    checksumType: 'DEFAULT',
    force: new Set<string>(),
    logMessage: 'updating missing checksum',
    ...overrides
  };
}

async function datastreamOf(objects: Record<string, ObjectSpec>, pid: string, dsid: string) {
  const repository = new FakeRepository(objects);
  const object = await repository.getObject(pid);
  if (!object) {
    throw new Error(`fixture object ${pid} missing`);
  }
  const datastream: Datastream = object.datastream(dsid);
  return { repository, datastream };
}

describe('shouldRepair', () => {
  it('should repair exactly when the checksum is absent or the ID is forced (property test)', () => {
    fc.assert(
      fc.property(checksumArb, dsidArb, fc.subarray(['DC', 'MASTER']), (checksum, dsid, forced) => {
        const record = { ...makeRecord('test:1', dsid), checksum };
        const expected = checksum.state !== 'recorded' || forced.includes(dsid);
        expect(shouldRepair(record, new Set(forced))).toBe(expected);
      })
    );
  });
});

describe('RepairDecider', () => {
  let stats: RunStats;
  let decider: RepairDecider;

  beforeEach(() => {
    stats = new RunStats(['ds_updated', 'ds_err']);
    decider = new RepairDecider(stats, silent);
  });

  it('should save a disabled checksum with the requested type', async () => {
    const { repository, datastream } = await datastreamOf(
      { 'obj:2': { DS2: single({ type: 'DISABLED', value: 'none' }) } },
      'obj:2',
      'DS2'
    );

    const outcome = await decider.maybeRepair(datastream, options({ checksumType: 'SHA-256' }));

    expect(outcome).toEqual({ attempted: true, updated: true });
    expect(stats.get('ds_updated')).toBe(1);
    expect(stats.get('ds_err')).toBe(0);
    expect(repository.saves).toEqual([
      { pid: 'obj:2', dsid: 'DS2', checksumType: 'SHA-256', comment: 'updating missing checksum' }
    ]);
  });

  it('should pass the repository-default sentinel through unchanged', async () => {
    const { repository, datastream } = await datastreamOf(
      { 'obj:2': { DS2: single({ type: 'MD5', value: 'none' }) } },
      'obj:2',
      'DS2'
    );

    await decider.maybeRepair(datastream, options());

    expect(repository.saves.map(save => save.checksumType)).toEqual(['DEFAULT']);
  });

  it('should repair a forced datastream that already has a checksum', async () => {
    const { repository, datastream } = await datastreamOf(
      { 'obj:3': { DS3: single({ type: 'MD5', value: 'abc123' }) } },
      'obj:3',
      'DS3'
    );

    const outcome = await decider.maybeRepair(datastream, options({ force: new Set(['DS3']) }));

    expect(outcome.attempted).toBe(true);
    expect(repository.saves).toHaveLength(1);
    expect(stats.get('ds_updated')).toBe(1);
  });

  it('should leave a datastream with a checksum alone', async () => {
    const { repository, datastream } = await datastreamOf(
      { 'obj:4': { DS: single({ type: 'SHA-1', value: 'abc123' }) } },
      'obj:4',
      'DS'
    );

    const outcome = await decider.maybeRepair(datastream, options({ force: new Set(['OTHER']) }));

    expect(outcome).toEqual({ attempted: false, updated: false });
    expect(repository.saves).toEqual([]);
    expect(stats.toJSON()).toEqual({ ds_updated: 0, ds_err: 0 });
  });

  it('should count a failed save as an error and not as an update', async () => {
    const { datastream } = await datastreamOf(
      { 'obj:5': { DS: { versions: [{ type: 'DISABLED', value: 'none' }], saveError: 'disk full' } } },
      'obj:5',
      'DS'
    );

    const outcome = await decider.maybeRepair(datastream, options());

    expect(outcome).toEqual({ attempted: true, updated: false, error: 'disk full' });
    expect(stats.get('ds_err')).toBe(1);
    expect(stats.get('ds_updated')).toBe(0);
  });
});
