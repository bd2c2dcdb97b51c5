/**
 * Unit Tests: Identifier Slot
 *
 * @see libs/capture/identifierSlot.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createIdentifierSlot } from '../../libs/capture/identifierSlot.js';

describe('IdentifierSlot', () => {
    it('should refuse to be read before it is sealed', () => {
        const slot = createIdentifierSlot();
        slot.hook('stmt-1');

        assert.throws(() => slot.read(), /IDENTIFIER_SLOT_OPEN/);
    });

    it('should return an empty string when nothing was delivered', () => {
        const slot = createIdentifierSlot();
        slot.seal();

        assert.strictEqual(slot.read(), '');
        assert.strictEqual(slot.deliveryCount(), 0);
    });

    it('should keep the first value and count every delivery', () => {
        const slot = createIdentifierSlot();
        const { hook } = slot;
        hook('stmt-1');
        hook('stmt-2');
        slot.seal();

        assert.strictEqual(slot.read(), 'stmt-1');
        assert.strictEqual(slot.deliveryCount(), 2);
    });

    it('should ignore blank values', () => {
        const slot = createIdentifierSlot();
        slot.hook('  ');
        slot.hook('stmt-3');
        slot.seal();

        assert.strictEqual(slot.read(), 'stmt-3');
    });

    it('should ignore values delivered after sealing', () => {
        const slot = createIdentifierSlot();
        slot.seal();
        slot.hook('late-stmt');

        assert.strictEqual(slot.isSealed(), true);
        assert.strictEqual(slot.read(), '');
        assert.strictEqual(slot.deliveryCount(), 1);
    });
});
