import { logger } from '../logging/logger.js';

/**
 * Callback handed to the primary channel. The channel calls it when it
 * learns the identifier assigned to the submitted statement.
 */
export type IdentifierHook = (identifier: string) => void;

/**
 * Single-assignment slot for the identifier emitted by the primary channel.
 *
 * The first non-empty value wins. Once sealed (when the primary call has
 * returned) the slot no longer accepts values, so a reader that waits for
 * `seal()` always observes the final identifier.
 */
export class IdentifierSlot {
    private value: string | null = null;
    private sealed = false;
    private deliveries = 0;

    /**
     * Hook bound to this slot, safe to pass around detached.
     */
    public readonly hook: IdentifierHook = (identifier: string) => {
        this.deliveries += 1;

        if (this.sealed) {
            logger.warn({ component: 'IdentifierSlot' }, 'Identifier delivered after primary call returned; ignored');
            return;
        }
        if (this.value !== null) {
            logger.warn({ component: 'IdentifierSlot', ignored: identifier, kept: this.value }, 'Identifier already captured; ignored');
            return;
        }
        if (identifier.trim() === '') {
            return;
        }

        this.value = identifier;
        logger.debug({ identifier }, 'Captured primary identifier');
    };

    /**
     * Close the slot. Idempotent.
     */
    public seal(): void {
        this.sealed = true;
    }

    public isSealed(): boolean {
        return this.sealed;
    }

    /**
     * The captured identifier, or '' when none was assigned.
     * FAIL-CLOSED: reading before the slot is sealed is a programming error.
     */
    public read(): string {
        if (!this.sealed) {
            throw new Error('IDENTIFIER_SLOT_OPEN: identifier read before primary call returned');
        }
        return this.value ?? '';
    }

    /**
     * Number of times the hook was invoked, including ignored deliveries.
     */
    public deliveryCount(): number {
        return this.deliveries;
    }
}

export function createIdentifierSlot(): IdentifierSlot {
    return new IdentifierSlot();
}
