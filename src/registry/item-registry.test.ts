import { BalanceLedger } from '../ledger/balance-ledger';
import { LogLevel, StructuredLogger } from '../logging/structured-logger';
import { ItemRegistry, TYPE_INDEX_CAPACITY } from './item-registry';
import { MintRequest, OperationContext, RegistryEvent } from './registry-types';
import { RegistryResult } from './registry-errors';

const silent = new StructuredLogger({ minLevel: LogLevel.SILENT });

const ISSUER = 'ST1TEST';
const AUTHORITY = 'ST2AUTH';

function at(height: number, caller: string = ISSUER): OperationContext {
  return { caller, height };
}

function passport(overrides: Partial<MintRequest> = {}): MintRequest {
  return {
    metadata: 'Passport metadata',
    itemType: 'passport',
    expiry: 100,
    serial: 'SERIAL123',
    location: 'BorderPost',
    category: 'TravelDoc',
    ...overrides,
  };
}

function setup(balances: Record<string, number> = { [ISSUER]: 100000 }) {
  const ledger = new BalanceLedger(balances);
  const events: Array<{ event: RegistryEvent; context: OperationContext }> = [];
  const registry = new ItemRegistry({
    transfer: ledger,
    logger: silent,
    events: { record: (event, context) => events.push({ event, context }) },
  });
  return { ledger, registry, events };
}

function errorKind<T>(result: RegistryResult<T>): string | undefined {
  return result.ok ? undefined : result.error.kind;
}

describe('ItemRegistry', () => {
  describe('mint', () => {
    it('mints an item and collects the issuer fee', () => {
      const { ledger, registry, events } = setup();
      registry.setAuthority(AUTHORITY, at(0, 'ST1ADMIN'));

      const result = registry.mint(passport(), at(0));

      expect(result).toEqual({ ok: true, value: 0 });
      expect(registry.getItem(0)).toEqual({
        id: 0,
        metadata: 'Passport metadata',
        itemType: 'passport',
        expiry: 100,
        serial: 'SERIAL123',
        location: 'BorderPost',
        category: 'TravelDoc',
        issuedAt: 0,
        issuer: ISSUER,
        status: true,
      });
      expect(ledger.transfers).toEqual([{ amount: 500, from: ISSUER, to: AUTHORITY }]);
      expect(ledger.balanceOf(AUTHORITY)).toBe(500);
      expect(events).toEqual([{ event: { type: 'item-minted', id: 0 }, context: at(0) }]);
    });

    it('rejects minting before the authority is set, without side effects', () => {
      const { ledger, registry, events } = setup();

      const result = registry.mint(passport({ itemType: 'aid-kit', serial: 'NOAUTH1', location: 'Global' }), at(0));

      expect(result).toEqual({
        ok: false,
        error: { kind: 'AuthorityNotSet', code: 1007, message: 'Authority must be set before minting' },
      });
      expect(registry.getItemCount()).toBe(0);
      expect(registry.isItemRegistered('NOAUTH1')).toBe(false);
      expect(ledger.transfers).toEqual([]);
      expect(events).toEqual([]);
    });

    it('rejects metadata longer than 100 characters before any other check', () => {
      const { registry, ledger } = setup();

      const result = registry.mint(passport({ metadata: 'A'.repeat(101), itemType: 'bogus' }), at(0));

      expect(errorKind(result)).toBe('InvalidMetadata');
      expect(ledger.transfers).toEqual([]);
    });

    it('enforces the max item count', () => {
      const { registry } = setup();
      registry.setAuthority(AUTHORITY, at(0));
      expect(registry.setMaxItems(1, at(0))).toEqual({ ok: true, value: true });

      expect(registry.mint(passport(), at(0))).toEqual({ ok: true, value: 0 });
      const second = registry.mint(passport({ serial: 'SERIAL456' }), at(0));

      expect(errorKind(second)).toBe('MaxItemsExceeded');
      expect(registry.getItemCount()).toBe(1);
    });

    it.each([
      ['InvalidItemType', passport({ itemType: 'invalid', expiry: 0, serial: '' })],
      ['ExpiryPast', passport({ expiry: 4, serial: '' })],
      ['InvalidSerial', passport({ serial: 'S'.repeat(51), location: '' })],
      ['InvalidLocation', passport({ location: 'L'.repeat(51), category: '' })],
      ['InvalidCategory', passport({ category: 'C'.repeat(31) })],
    ])('reports %s first when later fields are also invalid', (kind, request) => {
      const { registry } = setup();
      registry.setAuthority(AUTHORITY, at(5));

      expect(errorKind(registry.mint(request, at(5)))).toBe(kind);
    });

    it('checks capacity before field validation', () => {
      const { registry } = setup();
      registry.setAuthority(AUTHORITY, at(0));
      registry.setMaxItems(1, at(0));
      registry.mint(passport(), at(0));

      expect(errorKind(registry.mint(passport({ metadata: '' }), at(0)))).toBe('MaxItemsExceeded');
    });

    it('checks serial uniqueness before the authority', () => {
      const ledger = new BalanceLedger({ [ISSUER]: 1000 });
      const registry = new ItemRegistry({
        transfer: ledger,
        logger: silent,
        state: {
          parameters: { nextItemId: 1, maxItems: 5000, issuerFee: 500, authority: null, defaultLocation: 'Global' },
          items: [{ ...passport(), itemType: 'passport', id: 0, issuedAt: 0, issuer: ISSUER, status: true }],
          serialIndex: [['SERIAL123', 0]],
          typeIndex: [['passport', [0]]],
          amendments: [],
        },
      });

      expect(errorKind(registry.mint(passport(), at(0)))).toBe('ItemAlreadyExists');
      expect(errorKind(registry.mint(passport({ serial: 'OTHER' }), at(0)))).toBe('AuthorityNotSet');
    });

    it('never accepts a serial twice, whatever the other fields or caller', () => {
      const { ledger, registry } = setup({ [ISSUER]: 10000, ST3OTHER: 10000 });
      registry.setAuthority(AUTHORITY, at(0));
      registry.mint(passport(), at(0));
      registry.deactivate(0, at(0));

      const again = registry.mint(
        passport({ metadata: 'Different', itemType: 'visa', category: 'Other', location: 'Elsewhere' }),
        at(0, 'ST3OTHER')
      );

      expect(again).toEqual({
        ok: false,
        error: { kind: 'ItemAlreadyExists', code: 1005, message: 'Serial already registered: SERIAL123' },
      });
      expect(ledger.transfers).toHaveLength(1);
    });

    it('rejects an expiry below the current height and a non-integer expiry', () => {
      const { registry } = setup();
      registry.setAuthority(AUTHORITY, at(200));

      expect(errorKind(registry.mint(passport({ expiry: 100 }), at(200)))).toBe('ExpiryPast');
      expect(errorKind(registry.mint(passport({ expiry: 1.5 }), at(0)))).toBe('InvalidExpiry');
      expect(errorKind(registry.mint(passport({ expiry: -1 }), at(0)))).toBe('InvalidExpiry');
      expect(registry.mint(passport({ expiry: 200 }), at(200))).toEqual({ ok: true, value: 0 });
    });

    it('accepts the current default location and rejects an empty one', () => {
      const { registry } = setup();
      registry.setAuthority(AUTHORITY, at(0));
      registry.setDefaultLocation('Harbor', at(0));

      expect(errorKind(registry.mint(passport({ location: '' }), at(0)))).toBe('InvalidLocation');
      expect(registry.mint(passport({ location: 'Harbor' }), at(0))).toEqual({ ok: true, value: 0 });
      expect(registry.getItem(0)?.location).toBe('Harbor');
    });

    it('aborts the whole mint when the fee transfer fails', () => {
      const { ledger, registry, events } = setup({ [ISSUER]: 499 });
      registry.setAuthority(AUTHORITY, at(0));

      const result = registry.mint(passport(), at(0));

      expect(result).toEqual({
        ok: false,
        error: { kind: 'TransferFailed', code: 1015, message: 'Issuer fee transfer failed: insufficient-balance' },
      });
      expect(registry.getItemCount()).toBe(0);
      expect(registry.getItem(0)).toBeUndefined();
      expect(registry.isItemRegistered('SERIAL123')).toBe(false);
      expect(registry.getItemsByType('passport')).toBeUndefined();
      expect(ledger.balanceOf(ISSUER)).toBe(499);
      expect(events).toEqual([]);

      ledger.credit(ISSUER, 1);
      expect(registry.mint(passport(), at(0))).toEqual({ ok: true, value: 0 });
    });

    it('cannot mint when the issuer is the authority itself', () => {
      const { registry } = setup();
      registry.setAuthority(ISSUER, at(0));

      const result = registry.mint(passport(), at(0));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Issuer fee transfer failed: same-sender-recipient');
      }
    });

    it('charges the fee in force at mint time', () => {
      const { ledger, registry } = setup();
      registry.setAuthority(AUTHORITY, at(0));
      registry.setIssuerFee(1000, at(0));

      registry.mint(passport({ itemType: 'visa', expiry: 200, serial: 'FEE1', location: 'Loc', category: 'Cat' }), at(0));

      expect(ledger.transfers).toEqual([{ amount: 1000, from: ISSUER, to: AUTHORITY }]);
    });

    it('keeps ids dense across failed mints', () => {
      const { registry } = setup();
      registry.setAuthority(AUTHORITY, at(0));

      registry.mint(passport({ serial: 'A' }), at(0));
      registry.mint(passport({ serial: 'A' }), at(0));
      registry.mint(passport({ serial: 'B', itemType: 'boat' }), at(0));
      registry.mint(passport({ serial: 'C', itemType: 'document' }), at(0));
      registry.mint(passport({ serial: 'D', metadata: '' }), at(0));
      registry.mint(passport({ serial: 'E', itemType: 'visa' }), at(0));

      expect(registry.getItemCount()).toBe(3);
      expect([0, 1, 2].map(id => registry.getItem(id)?.serial)).toEqual(['A', 'C', 'E']);
      expect(registry.getItem(3)).toBeUndefined();
    });
  });

  describe('type index', () => {
    it('lists ids per type in mint order', () => {
      const { registry } = setup();
      registry.setAuthority(AUTHORITY, at(0));
      registry.mint(passport({ serial: 'P1' }), at(0));
      registry.mint(passport({ serial: 'V1', itemType: 'visa' }), at(0));
      registry.mint(passport({ serial: 'P2' }), at(0));

      expect(registry.getItemsByType('passport')).toEqual([0, 2]);
      expect(registry.getItemsByType('visa')).toEqual([1]);
      expect(registry.getItemsByType('document')).toBeUndefined();
      expect(registry.getItemsByType('spaceship')).toBeUndefined();
    });

    it('evicts and announces the oldest id once a type is full', () => {
      const { registry, events } = setup();
      registry.setAuthority(AUTHORITY, at(0));

      for (let i = 0; i <= TYPE_INDEX_CAPACITY; i++) {
        expect(registry.mint(passport({ serial: `P-${i}` }), at(0)).ok).toBe(true);
      }

      const ids = registry.getItemsByType('passport');
      expect(ids).toHaveLength(TYPE_INDEX_CAPACITY);
      expect(ids?.[0]).toBe(1);
      expect(ids?.[TYPE_INDEX_CAPACITY - 1]).toBe(TYPE_INDEX_CAPACITY);
      expect(events.slice(-2).map(e => e.event)).toEqual([
        { type: 'type-index-evicted', itemType: 'passport', evictedId: 0 },
        { type: 'item-minted', id: TYPE_INDEX_CAPACITY },
      ]);
      expect(registry.getItem(0)?.serial).toBe('P-0');
      expect(registry.isItemRegistered('P-0')).toBe(true);
    });
  });

  describe('update', () => {
    it('replaces mutable fields and records the amendment', () => {
      const { registry, events } = setup();
      registry.setAuthority(AUTHORITY, at(0));
      registry.mint(
        passport({ metadata: 'OldMeta', itemType: 'document', expiry: 300, serial: 'UPD1', location: 'OldLoc', category: 'OldCat' }),
        at(0)
      );

      const result = registry.update({ id: 0, metadata: 'NewMeta', expiry: 400, location: 'NewLoc' }, at(10));

      expect(result).toEqual({ ok: true, value: true });
      expect(registry.getItem(0)).toEqual({
        id: 0,
        metadata: 'NewMeta',
        itemType: 'document',
        expiry: 400,
        serial: 'UPD1',
        location: 'NewLoc',
        category: 'OldCat',
        issuedAt: 0,
        issuer: ISSUER,
        status: true,
      });
      expect(registry.getItemUpdates(0)).toEqual({
        updatedMetadata: 'NewMeta',
        updatedExpiry: 400,
        updatedLocation: 'NewLoc',
        updateTimestamp: 10,
        updater: ISSUER,
      });
      expect(events[events.length - 1]).toEqual({ event: { type: 'item-updated', id: 0 }, context: at(10) });
    });

    it('validates expiry against the height at update time', () => {
      const { registry } = setup();
      registry.setAuthority(AUTHORITY, at(0));
      registry.mint(passport({ expiry: 300 }), at(0));

      expect(errorKind(registry.update({ id: 0, metadata: 'X', expiry: 300, location: 'Loc' }, at(301)))).toBe('ExpiryPast');
      expect(registry.getItemUpdates(0)).toBeUndefined();

      expect(registry.update({ id: 0, metadata: 'X', expiry: 400, location: 'Loc' }, at(301))).toEqual({ ok: true, value: true });
      expect(registry.getItem(0)?.expiry).toBe(400);
    });

    it('keeps only the latest amendment', () => {
      const { registry } = setup();
      registry.setAuthority(AUTHORITY, at(0));
      registry.mint(passport(), at(0));

      registry.update({ id: 0, metadata: 'First', expiry: 500, location: 'One' }, at(1));
      registry.update({ id: 0, metadata: 'Second', expiry: 600, location: 'Two' }, at(2));

      expect(registry.getItemUpdates(0)).toEqual({
        updatedMetadata: 'Second',
        updatedExpiry: 600,
        updatedLocation: 'Two',
        updateTimestamp: 2,
        updater: ISSUER,
      });
    });

    it('reports a missing item as InvalidUpdate', () => {
      const { registry } = setup();
      registry.setAuthority(AUTHORITY, at(0));

      expect(registry.update({ id: 99, metadata: 'NewMeta', expiry: 400, location: 'NewLoc' }, at(0))).toEqual({
        ok: false,
        error: { kind: 'InvalidUpdate', code: 1013, message: 'Item not found: 99' },
      });
    });

    it('only lets the issuer update, before checking status or fields', () => {
      const { registry } = setup();
      registry.setAuthority(AUTHORITY, at(0));
      registry.mint(passport(), at(0));
      registry.update({ id: 0, metadata: 'Changed', expiry: 400, location: 'Loc' }, at(0));

      expect(errorKind(registry.update({ id: 0, metadata: '', expiry: 400, location: 'Loc' }, at(0, 'ST3FAKE')))).toBe('Unauthorized');
      expect(registry.getItem(0)?.metadata).toBe('Changed');
    });

    it('rejects updates to a deactivated item', () => {
      const { registry } = setup();
      registry.setAuthority(AUTHORITY, at(0));
      registry.mint(passport(), at(0));
      registry.deactivate(0, at(0));

      expect(errorKind(registry.update({ id: 0, metadata: 'Late', expiry: 400, location: 'Loc' }, at(1)))).toBe('UpdateNotAllowed');
    });

    it.each([
      ['InvalidMetadata', { metadata: '', expiry: 0, location: '' }],
      ['ExpiryPast', { metadata: 'ok', expiry: 0, location: '' }],
      ['InvalidLocation', { metadata: 'ok', expiry: 50, location: '' }],
    ])('checks fields in order and reports %s', (kind, fields) => {
      const { registry } = setup();
      registry.setAuthority(AUTHORITY, at(0));
      registry.mint(passport(), at(0));

      expect(errorKind(registry.update({ id: 0, ...fields }, at(5)))).toBe(kind);
      expect(registry.getItem(0)?.metadata).toBe('Passport metadata');
    });
  });

  describe('deactivate', () => {
    it('deactivates idempotently and leaves the amendment log alone', () => {
      const { registry, events } = setup();
      registry.setAuthority(AUTHORITY, at(0));
      registry.mint(passport({ itemType: 'aid-kit', expiry: 150, serial: 'DEACT1' }), at(0));

      expect(registry.deactivate(0, at(1))).toEqual({ ok: true, value: true });
      expect(registry.getItem(0)?.status).toBe(false);
      expect(registry.deactivate(0, at(2))).toEqual({ ok: true, value: true });
      expect(registry.getItem(0)?.status).toBe(false);

      expect(registry.getItemUpdates(0)).toBeUndefined();
      expect(events.map(e => e.event.type)).toEqual(['item-minted', 'item-deactivated', 'item-deactivated']);
    });

    it('only lets the issuer deactivate', () => {
      const { registry } = setup();
      registry.setAuthority(AUTHORITY, at(0));
      registry.mint(passport(), at(0));

      expect(errorKind(registry.deactivate(0, at(0, 'ST3FAKE')))).toBe('Unauthorized');
      expect(errorKind(registry.deactivate(7, at(0)))).toBe('InvalidUpdate');
      expect(registry.getItem(0)?.status).toBe(true);
    });
  });

  describe('queries', () => {
    it('returns copies that cannot alter registry state', () => {
      const { registry } = setup();
      registry.setAuthority(AUTHORITY, at(0));
      registry.mint(passport(), at(0));

      const item = registry.getItem(0);
      if (item) item.status = false;
      registry.getItemsByType('passport')?.push(42);

      expect(registry.getItem(0)?.status).toBe(true);
      expect(registry.getItemsByType('passport')).toEqual([0]);
    });
  });

  describe('state export', () => {
    it('restores an equivalent registry from exported state', () => {
      const { registry } = setup();
      registry.setAuthority(AUTHORITY, at(0));
      registry.mint(passport(), at(0));
      registry.mint(passport({ serial: 'V1', itemType: 'visa' }), at(0));
      registry.update({ id: 1, metadata: 'Amended', expiry: 150, location: 'Port' }, at(3));

      const restored = new ItemRegistry({
        transfer: new BalanceLedger(),
        logger: silent,
        state: registry.exportState(),
      });

      expect(restored.getItemCount()).toBe(2);
      expect(restored.getItem(1)).toEqual(registry.getItem(1));
      expect(restored.getItemUpdates(1)).toEqual(registry.getItemUpdates(1));
      expect(restored.getItemsByType('visa')).toEqual([1]);
      expect(restored.isItemRegistered('SERIAL123')).toBe(true);
      expect(restored.getParameters().authority).toBe(AUTHORITY);
    });

    it('refuses state whose item count disagrees with nextItemId', () => {
      const state = setup().registry.exportState();
      state.parameters.nextItemId = 1;

      expect(() => new ItemRegistry({ transfer: new BalanceLedger(), logger: silent, state })).toThrow(
        'Inconsistent registry state: 0 items but nextItemId 1'
      );
    });

    describe('cross-checks', () => {
      function mintedState() {
        const { registry } = setup();
        registry.setAuthority(AUTHORITY, at(0));
        registry.mint(passport(), at(0));
        registry.mint(passport({ serial: 'V1', itemType: 'visa' }), at(0));
        return registry.exportState();
      }

      function restore(state: ReturnType<typeof mintedState>) {
        return () => new ItemRegistry({ transfer: new BalanceLedger(), logger: silent, state });
      }

      it('refuses a type index listing an item of another type', () => {
        const state = mintedState();
        state.typeIndex = [
          ['passport', [0, 1]],
          ['visa', [1]],
        ];

        expect(restore(state)).toThrow('Inconsistent registry state: type index passport lists item 1');
      });

      it('refuses a type index listing an id past nextItemId', () => {
        const state = mintedState();
        state.typeIndex = [['passport', [0, 7]]];

        expect(restore(state)).toThrow('Inconsistent registry state: type index passport lists item 7');
      });

      it('refuses an amendment for an unknown item', () => {
        const state = mintedState();
        state.amendments = [
          [
            5,
            { updatedMetadata: 'm', updatedExpiry: 10, updatedLocation: 'L', updateTimestamp: 1, updater: ISSUER },
          ],
        ];

        expect(restore(state)).toThrow('Inconsistent registry state: amendment for unknown item 5');
      });

      it('refuses parameters the setters would refuse', () => {
        const state = mintedState();
        state.parameters.maxItems = 0;

        expect(restore(state)).toThrow('Invalid registry parameters: maxItems must be a positive integer, got 0');
      });
    });
  });
});
