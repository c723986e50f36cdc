import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { ok, reject } from '../outcome';
import type { Economy, Outcome } from '../types';

const COIN = 'coin';

/**
 * Inventory and coin balances live behind Postgres functions so each
 * consume/grant is a single atomic statement.
 */
export class SupabaseEconomy implements Economy {
    private supabase: SupabaseClient;

    constructor(supabase: SupabaseClient) {
        this.supabase = supabase;
    }

    public async consumeItem(actorId: string, item: string): Promise<Outcome<boolean>> {
        const { data, error } = await this.supabase.rpc('consume_item', {
            p_owner: actorId,
            p_item: item,
            p_quantity: 1
        });
        if (error) {
            console.error('[Economy] consume_item failed:', error.message);
            return reject('StorageFailure', error.message);
        }
        return this.expect(z.boolean(), data, 'consume_item');
    }

    public async grantCurrency(actorId: string, amount: number): Promise<Outcome<number>> {
        return this.grant(actorId, COIN, amount);
    }

    public async revokeCurrency(actorId: string, amount: number): Promise<Outcome<number>> {
        return this.grant(actorId, COIN, -amount);
    }

    public async grantItem(actorId: string, item: string): Promise<Outcome<string>> {
        const granted = await this.grant(actorId, item, 1);
        if (granted.error !== null) return reject(granted.error.kind, granted.error.message);
        return ok(item);
    }

    public async hasActiveFence(ownerId: string): Promise<Outcome<boolean>> {
        const { data, error } = await this.supabase.rpc('has_active_fence', { p_owner: ownerId });
        if (error) {
            console.error('[Economy] has_active_fence failed:', error.message);
            return reject('StorageFailure', error.message);
        }
        return this.expect(z.boolean(), data, 'has_active_fence');
    }

    /** Returns the actor's new quantity of `item`. */
    private async grant(actorId: string, item: string, quantity: number): Promise<Outcome<number>> {
        const { data, error } = await this.supabase.rpc('grant_item', {
            p_owner: actorId,
            p_item: item,
            p_quantity: quantity
        });
        if (error) {
            console.error('[Economy] grant_item failed:', error.message);
            return reject('StorageFailure', error.message);
        }
        return this.expect(z.number(), data, 'grant_item');
    }

    private expect<T>(schema: z.ZodType<T>, value: unknown, rpc: string): Outcome<T> {
        const parsed = schema.safeParse(value);
        if (!parsed.success) {
            return reject('StorageFailure', `Unexpected ${rpc} result`);
        }
        return ok(parsed.data);
    }
}
