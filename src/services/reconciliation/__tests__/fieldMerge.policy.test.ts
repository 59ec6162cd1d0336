import { describe, expect, it } from 'vitest';
import { BULK_IMPORT_LABEL } from '../../../constants/facility.constants';
import { ContactPrecedence } from '../../../models/merge-policy.model';
import { makeRecord, NO_AMENITIES } from '../../../__tests__/fixtures';
import { isInteractiveLabel, mergeFields, mergeFieldsWithAudit } from '../fieldMerge.policy';

const JAN = new Date('2024-01-01T00:00:00Z');
const FEB = new Date('2024-02-01T00:00:00Z');
const MAR = new Date('2024-03-01T00:00:00Z');

// ============================================================================
// Commercial fields
// ============================================================================

describe('mergeFields - commercial fields', () => {
  const imported = makeRecord({
    phone: '555-0100',
    website: null,
    handlingFee: 150,
    updatedBy: BULK_IMPORT_LABEL,
    lastUpdated: JAN,
    isVerified: true,
  });

  it('takes user-edited incoming values over existing ones', () => {
    const incoming = makeRecord({ phone: '555-0199', handlingFee: 175, updatedBy: 'pilot1', lastUpdated: MAR });

    const merged = mergeFields(imported, incoming);

    expect(merged.phone).toBe('555-0199');
    expect(merged.handlingFee).toBe(175);
  });

  it('only fills gaps from bulk-imported incoming data', () => {
    const incoming = makeRecord({
      phone: '555-0142',
      website: 'https://harbor.example',
      updatedBy: BULK_IMPORT_LABEL,
      lastUpdated: MAR,
    });

    const merged = mergeFields(imported, incoming);

    expect(merged.phone).toBe('555-0100');
    expect(merged.website).toBe('https://harbor.example');
  });

  it('treats a missing updatedBy like the import label', () => {
    const incoming = makeRecord({ phone: '555-0142', updatedBy: null, lastUpdated: MAR });

    expect(mergeFields(imported, incoming).phone).toBe('555-0100');
  });

  it('never lets an empty incoming value clear a stored one', () => {
    const incoming = makeRecord({ phone: null, handlingFee: null, updatedBy: 'pilot1', lastUpdated: MAR });

    const merged = mergeFields(imported, incoming);

    expect(merged.phone).toBe('555-0100');
    expect(merged.handlingFee).toBe(150);
  });

  it('keeps a newer interactive edit under latest-update precedence', () => {
    const existing = makeRecord({ phone: '555-0111', updatedBy: 'pilot2', lastUpdated: MAR });
    const incoming = makeRecord({ phone: '555-0122', updatedBy: 'pilot1', lastUpdated: FEB });

    expect(mergeFields(existing, incoming).phone).toBe('555-0111');
    expect(
      mergeFields(existing, incoming, { contactPrecedence: ContactPrecedence.INCOMING_WINS }).phone,
    ).toBe('555-0122');
  });

  it('gives ties between interactive edits to incoming', () => {
    const existing = makeRecord({ phone: '555-0111', updatedBy: 'pilot2', lastUpdated: FEB });
    const incoming = makeRecord({ phone: '555-0122', updatedBy: 'pilot1', lastUpdated: FEB });

    expect(mergeFields(existing, incoming).phone).toBe('555-0122');
  });
});

// ============================================================================
// Ramp fee waiver
// ============================================================================

describe('mergeFields - ramp fee waiver', () => {
  const existing = makeRecord({ rampFee: 25, rampFeeWaived: true, updatedBy: BULK_IMPORT_LABEL, lastUpdated: JAN });

  it('keeps the stored waiver when incoming has no ramp fee', () => {
    const incoming = makeRecord({ rampFee: null, rampFeeWaived: false, updatedBy: 'pilot1', lastUpdated: MAR });

    const merged = mergeFields(existing, incoming);

    expect(merged.rampFee).toBe(25);
    expect(merged.rampFeeWaived).toBe(true);
  });

  it('takes the waiver together with an incoming ramp fee', () => {
    const incoming = makeRecord({ rampFee: 40, rampFeeWaived: false, updatedBy: 'pilot1', lastUpdated: MAR });

    const merged = mergeFields(existing, incoming);

    expect(merged.rampFee).toBe(40);
    expect(merged.rampFeeWaived).toBe(false);
  });
});

// ============================================================================
// Amenities
// ============================================================================

describe('mergeFields - amenities', () => {
  it('combines flags with logical OR', () => {
    const existing = makeRecord({ amenities: { ...NO_AMENITIES, crewCar: true, oxygen: true } });
    const incoming = makeRecord({ amenities: { ...NO_AMENITIES, crewLounge: true } });

    expect(mergeFields(existing, incoming).amenities).toEqual({
      ...NO_AMENITIES,
      crewCar: true,
      crewLounge: true,
      oxygen: true,
    });
  });
});

// ============================================================================
// Fuel
// ============================================================================

describe('mergeFields - fuel prices', () => {
  const existing = makeRecord({
    jetAPrice: 6.5,
    avgasPrice: 7.0,
    fuelPriceDate: JAN,
    fuelPriceReporter: BULK_IMPORT_LABEL,
  });

  it('takes the newer observation as one unit', () => {
    const incoming = makeRecord({ jetAPrice: 7.25, avgasPrice: null, fuelPriceDate: FEB, fuelPriceReporter: 'pilot1' });

    const merged = mergeFields(existing, incoming);

    expect(merged.jetAPrice).toBe(7.25);
    expect(merged.avgasPrice).toBeNull();
    expect(merged.fuelPriceDate).toEqual(FEB);
    expect(merged.fuelPriceReporter).toBe('pilot1');
  });

  it('keeps the stored observation when incoming is older', () => {
    const older = makeRecord({
      jetAPrice: 5.99,
      fuelPriceDate: new Date('2023-12-01T00:00:00Z'),
      updatedBy: 'pilot1',
      lastUpdated: MAR,
    });

    const merged = mergeFields(existing, older);

    expect(merged.jetAPrice).toBe(6.5);
    expect(merged.avgasPrice).toBe(7.0);
    expect(merged.fuelPriceDate).toEqual(JAN);
  });

  it('ignores an incoming price without an observation time', () => {
    const undated = makeRecord({ jetAPrice: 9.99, fuelPriceDate: null });

    const merged = mergeFields(existing, undated);

    expect(merged.jetAPrice).toBe(6.5);
    expect(merged.fuelPriceDate).toEqual(JAN);
  });

  it('prefers any dated price over none', () => {
    const empty = makeRecord();

    expect(mergeFields(empty, existing).jetAPrice).toBe(6.5);
    expect(mergeFields(existing, empty).jetAPrice).toBe(6.5);
  });
});

// ============================================================================
// Provenance
// ============================================================================

describe('mergeFields - provenance', () => {
  it('keeps identity from existing', () => {
    const existing = makeRecord({ id: 'local-1', name: 'Signature Aviation', locationCode: 'KSFO' });
    const incoming = makeRecord({ id: 'other', name: 'Signature', locationCode: 'KSFO' });

    const merged = mergeFields(existing, incoming);

    expect(merged.id).toBe('local-1');
    expect(merged.name).toBe('Signature Aviation');
  });

  it('keeps verification sticky in both directions', () => {
    const verified = makeRecord({ isVerified: true });
    const unverified = makeRecord({ isVerified: false });

    expect(mergeFields(verified, unverified).isVerified).toBe(true);
    expect(mergeFields(unverified, verified).isVerified).toBe(true);
    expect(mergeFields(unverified, unverified).isVerified).toBe(false);
  });

  it('adopts a remote identifier and never drops one', () => {
    const local = makeRecord({ remoteIdentifier: null });
    const remote = makeRecord({ remoteIdentifier: 'remote-7' });

    expect(mergeFields(local, remote).remoteIdentifier).toBe('remote-7');
    expect(mergeFields(remote, local).remoteIdentifier).toBe('remote-7');
  });

  it('takes lastUpdated and updatedBy from the newer side', () => {
    const existing = makeRecord({ updatedBy: 'pilot2', lastUpdated: MAR });
    const incoming = makeRecord({ updatedBy: 'pilot1', lastUpdated: FEB });

    const merged = mergeFields(existing, incoming);

    expect(merged.lastUpdated).toEqual(MAR);
    expect(merged.updatedBy).toBe('pilot2');
  });

  it('keeps the user label when a newer import lands on a user edit', () => {
    const edited = makeRecord({ jetAPrice: 7.99, updatedBy: 'pilot1', lastUpdated: FEB, pendingPush: true });
    const imported = makeRecord({ updatedBy: BULK_IMPORT_LABEL, lastUpdated: MAR, isVerified: true });

    const merged = mergeFields(edited, imported);

    expect(merged.updatedBy).toBe('pilot1');
    expect(merged.lastUpdated).toEqual(MAR);
    expect(merged.pendingPush).toBe(true);
  });

  it('lets a newer import relabel data that was never user-edited', () => {
    const unlabeled = makeRecord({ updatedBy: null, lastUpdated: JAN });
    const imported = makeRecord({ updatedBy: BULK_IMPORT_LABEL, lastUpdated: MAR });

    expect(mergeFields(unlabeled, imported).updatedBy).toBe(BULK_IMPORT_LABEL);
  });

  it('keeps a pending push unless the merge is an acknowledgement', () => {
    const pending = makeRecord({ pendingPush: true });
    const confirmed = makeRecord({ pendingPush: false, remoteIdentifier: 'remote-1' });

    expect(mergeFields(pending, confirmed).pendingPush).toBe(true);
    expect(mergeFields(pending, confirmed, { acknowledgement: true }).pendingPush).toBe(false);
  });
});

// ============================================================================
// Audit trail
// ============================================================================

describe('mergeFieldsWithAudit', () => {
  it('records each field that moved with its reason', () => {
    const existing = makeRecord({ phone: '555-0100', updatedBy: BULK_IMPORT_LABEL, lastUpdated: JAN });
    const incoming = makeRecord({ phone: '555-0199', updatedBy: 'pilot1', lastUpdated: MAR });

    const { changes } = mergeFieldsWithAudit(existing, incoming);

    expect(changes).toContainEqual({
      field: 'phone',
      oldValue: '555-0100',
      newValue: '555-0199',
      source: 'INCOMING',
      reason: 'edited by pilot1',
    });
    expect(changes.map((change) => change.field)).toEqual(['phone', 'lastUpdated', 'updatedBy']);
  });

  it('reports nothing when incoming changes nothing', () => {
    const existing = makeRecord({ phone: '555-0100' });

    expect(mergeFieldsWithAudit(existing, { ...existing }).changes).toEqual([]);
  });
});

describe('isInteractiveLabel', () => {
  it('rejects the import label and blanks', () => {
    expect(isInteractiveLabel('pilot1')).toBe(true);
    expect(isInteractiveLabel(BULK_IMPORT_LABEL)).toBe(false);
    expect(isInteractiveLabel('  ')).toBe(false);
    expect(isInteractiveLabel(null)).toBe(false);
  });
});
