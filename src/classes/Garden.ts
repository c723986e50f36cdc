import { ITEM_FERTILIZER } from '../constants';
import { fail, ok, reject } from '../outcome';
import type {
    ActionContext,
    Clock,
    Economy,
    GenerationRecord,
    LeaderboardEntry,
    Outcome,
    PlantRepository,
    PlantState,
    PlantView,
    Rejection,
    SettleResult,
    Timestamp
} from '../types';
import { PlantEngine } from './PlantEngine';
import { viewPlant } from './PlantView';

export const systemClock: Clock = { now: () => Date.now() };

type Step<T> = (plant: PlantState, ctx: ActionContext, now: Timestamp, reborn: GenerationRecord | null) => Outcome<T>;

function stepOf(outcome: Outcome<PlantState>): Outcome<{ plant: PlantState }> {
    return outcome.error !== null ? fail<{ plant: PlantState }>(outcome.error) : ok({ plant: outcome.data });
}

/** An economy side effect and its inverse. */
interface Effect<T> {
    apply(result: T): Promise<Outcome<unknown>>;
    undo(result: T): Promise<Outcome<unknown>>;
}

interface ActOptions<T> {
    effect?: Effect<T>;
    watering?: boolean; // visitors need their watering can checked
}

const skip = async (): Promise<Outcome<null>> => ok(null);

interface Committed<T> {
    result: T;
    plant: PlantState;
    now: Timestamp;
    reborn: GenerationRecord | null;
}

export interface GardenOptions {
    engine: PlantEngine;
    repository: PlantRepository;
    economy: Economy;
    clock?: Clock;
}

export interface SweepReport {
    checked: number;
    reborn: GenerationRecord[];
    failures: Rejection[];
}

/**
 * One plant per account. Each call loads the owner's plant, settles elapsed
 * time (a plant that died of neglect is replaced before anything else
 * happens), applies a single engine step and saves it back under the
 * repository's version check.
 */
export class Garden {
    private engine: PlantEngine;
    private repository: PlantRepository;
    private economy: Economy;
    private clock: Clock;

    constructor(options: GardenOptions) {
        this.engine = options.engine;
        this.repository = options.repository;
        this.economy = options.economy;
        this.clock = options.clock ?? systemClock;
    }

    // --- LIFECYCLE ---

    public async adopt(ownerId: string): Promise<Outcome<PlantView>> {
        const existing = await this.repository.loadPlant(ownerId);
        if (existing.error !== null) return fail(existing.error);
        if (existing.data !== null) {
            return reject('PlantExists', 'You already have a plant to look after.');
        }

        const now = this.clock.now();
        const saved = await this.repository.savePlant(this.engine.plantSeed(ownerId, now));
        if (saved.error !== null) return fail(saved.error);

        console.log(`[Garden] ${ownerId} planted ${saved.data.name}`);
        return ok(viewPlant(saved.data, now, this.engine.config));
    }

    public async inspect(ownerId: string): Promise<Outcome<PlantView>> {
        const now = this.clock.now();
        const prepared = await this.prepare(ownerId, now);
        if (prepared.error !== null) return fail(prepared.error);

        let plant = prepared.data.plant;
        if (prepared.data.reborn !== null) {
            const saved = await this.commit(plant, prepared.data.reborn);
            if (saved.error !== null) return fail(saved.error);
            plant = saved.data;
        }

        const fence = await this.economy.hasActiveFence(ownerId);
        if (fence.error !== null) return fail(fence.error);
        return ok(viewPlant(plant, now, this.engine.config, { fenceActive: fence.data }));
    }

    public async leaderboard(limit: number = 10): Promise<Outcome<LeaderboardEntry[]>> {
        return this.repository.listTopScores(limit);
    }

    /** Replace every plant that has died since it was last touched. */
    public async sweepDead(): Promise<Outcome<SweepReport>> {
        const listed = await this.repository.listPlants();
        if (listed.error !== null) return fail(listed.error);

        const now = this.clock.now();
        const report: SweepReport = { checked: listed.data.length, reborn: [], failures: [] };

        for (const plant of listed.data) {
            const { plant: next, reborn } = this.engine.settle(plant, now);
            if (reborn === null) continue;

            const saved = await this.commit(next, reborn);
            if (saved.error !== null) {
                console.error(`[Garden] Sweep failed for ${plant.ownerId}:`, saved.error.message);
                report.failures.push(saved.error);
                continue;
            }
            report.reborn.push(reborn);
        }

        console.log(`[Garden] Sweep checked ${report.checked} plants, replaced ${report.reborn.length}.`);
        return ok(report);
    }

    // --- ACTIONS ---

    public async water(ownerId: string, actorId: string): Promise<Outcome<PlantView>> {
        const done = await this.act(ownerId, actorId, (plant, ctx, now) => this.engine.water(plant, ctx, now), {
            watering: true,
            effect: {
                apply: result => (result.visitorCoins > 0 ? this.economy.grantCurrency(actorId, result.visitorCoins) : skip()),
                undo: result => (result.visitorCoins > 0 ? this.economy.revokeCurrency(actorId, result.visitorCoins) : skip())
            }
        });
        if (done.error !== null) return fail(done.error);
        return ok(viewPlant(done.data.plant, done.data.now, this.engine.config));
    }

    public async fertilize(ownerId: string, actorId: string): Promise<Outcome<PlantView>> {
        const done = await this.act(ownerId, actorId, (plant, ctx, now) => stepOf(this.engine.fertilize(plant, ctx, now)), {
            effect: {
                apply: async () => {
                    const consumed = await this.economy.consumeItem(actorId, ITEM_FERTILIZER);
                    if (consumed.error !== null) return fail(consumed.error);
                    if (!consumed.data) {
                        return reject('InsufficientFunds', "You don't have any fertilizer to use.");
                    }
                    return ok(true);
                },
                undo: () => this.economy.grantItem(actorId, ITEM_FERTILIZER)
            }
        });
        if (done.error !== null) return fail(done.error);
        return ok(viewPlant(done.data.plant, done.data.now, this.engine.config));
    }

    public async shake(ownerId: string, actorId: string): Promise<Outcome<{ view: PlantView; coins: number }>> {
        const done = await this.act(ownerId, actorId, (plant, ctx, now) => this.engine.shake(plant, ctx, now), {
            effect: {
                apply: result => this.economy.grantCurrency(actorId, result.coins),
                undo: result => this.economy.revokeCurrency(actorId, result.coins)
            }
        });
        if (done.error !== null) return fail(done.error);

        const { result, plant, now } = done.data;
        return ok({ view: viewPlant(plant, now, this.engine.config), coins: result.coins });
    }

    public async search(ownerId: string, actorId: string): Promise<Outcome<{ view: PlantView; petal: string | null }>> {
        const done = await this.act(ownerId, actorId, (plant, ctx, now) => this.engine.search(plant, ctx, now), {
            effect: {
                apply: result => (result.petal !== null ? this.economy.grantItem(actorId, result.petal) : skip()),
                undo: result => (result.petal !== null ? this.economy.consumeItem(actorId, result.petal) : skip())
            }
        });
        if (done.error !== null) return fail(done.error);

        const { result, plant, now } = done.data;
        return ok({ view: viewPlant(plant, now, this.engine.config), petal: result.petal });
    }

    public async rename(ownerId: string, actorId: string, name: string): Promise<Outcome<PlantView>> {
        const done = await this.act(ownerId, actorId, (plant, ctx, now) => stepOf(this.engine.rename(plant, ctx, name, now)));
        if (done.error !== null) return fail(done.error);
        return ok(viewPlant(done.data.plant, done.data.now, this.engine.config));
    }

    public async harvest(
        ownerId: string,
        actorId: string,
        confirm: boolean
    ): Promise<Outcome<{ view: PlantView; record: GenerationRecord }>> {
        const done = await this.act(ownerId, actorId, (plant, ctx, now, reborn) => {
            // Settling already replaced a dead plant; that is the harvest
            if (reborn !== null && ctx.actorId === ownerId && confirm) {
                return ok({ plant, record: reborn });
            }
            return this.engine.harvest(plant, ctx, confirm, now);
        });
        if (done.error !== null) return fail(done.error);

        const { result, plant, now } = done.data;
        console.log(`[Garden] ${ownerId} harvested generation ${result.record.generation} with ${result.record.score} points`);
        return ok({ view: viewPlant(plant, now, this.engine.config), record: result.record });
    }

    // --- PLUMBING ---

    private async prepare(ownerId: string, now: Timestamp): Promise<Outcome<SettleResult>> {
        const loaded = await this.repository.loadPlant(ownerId);
        if (loaded.error !== null) return fail(loaded.error);
        if (loaded.data === null) {
            return reject('NoPlant', 'There is no plant here.');
        }

        const settled = this.engine.settle(loaded.data, now);
        if (settled.reborn !== null) {
            console.log(`[Garden] ${ownerId}'s plant died of neglect, generation ${settled.plant.generation} sprouted.`);
        }
        return ok(settled);
    }

    private async context(plant: PlantState, actorId: string, watering: boolean): Promise<Outcome<ActionContext>> {
        if (actorId === plant.ownerId) return ok({ actorId });

        const fence = await this.economy.hasActiveFence(plant.ownerId);
        if (fence.error !== null) return fail(fence.error);
        if (!watering) return ok({ actorId, fenceActive: fence.data });

        const can = await this.repository.lastVisitorWatering(actorId);
        if (can.error !== null) return fail(can.error);
        return ok({ actorId, fenceActive: fence.data, wateringCanUsedAt: can.data });
    }

    /**
     * The finished generation is recorded before its row is overwritten.
     * Recording is idempotent, so a save that loses the race can be retried.
     */
    private async commit(plant: PlantState, reborn: GenerationRecord | null): Promise<Outcome<PlantState>> {
        if (reborn !== null) {
            const recorded = await this.repository.recordGenerationResult(reborn);
            if (recorded.error !== null) return fail(recorded.error);
        }
        return this.repository.savePlant(plant);
    }

    /**
     * The effect runs after the engine accepts the step and before the save.
     * A failed save undoes it.
     */
    private async act<T extends { plant: PlantState }>(
        ownerId: string,
        actorId: string,
        step: Step<T>,
        options: ActOptions<T> = {}
    ): Promise<Outcome<Committed<T>>> {
        const now = this.clock.now();
        const prepared = await this.prepare(ownerId, now);
        if (prepared.error !== null) return fail(prepared.error);
        const { plant, reborn } = prepared.data;

        const ctx = await this.context(plant, actorId, options.watering ?? false);
        if (ctx.error !== null) return fail(ctx.error);

        const stepped = step(plant, ctx.data, now, reborn);
        if (stepped.error !== null) {
            return this.rejectKeepingRebirth<Committed<T>>(plant, reborn, stepped.error);
        }

        const { effect } = options;
        if (effect) {
            const applied = await effect.apply(stepped.data);
            if (applied.error !== null) {
                return this.rejectKeepingRebirth<Committed<T>>(plant, reborn, applied.error);
            }
        }

        const saved = await this.commit(stepped.data.plant, reborn);
        if (saved.error !== null) {
            if (effect) {
                const undone = await effect.undo(stepped.data);
                if (undone.error !== null) {
                    console.error(`[Garden] Could not undo ${actorId}'s rewards on ${ownerId}'s plant:`, undone.error.message);
                }
            }
            return fail(saved.error);
        }

        return ok({ result: stepped.data, plant: saved.data, now, reborn });
    }

    /** A rejected action still leaves a forced rebirth in place. */
    private async rejectKeepingRebirth<T>(
        plant: PlantState,
        reborn: GenerationRecord | null,
        error: Rejection
    ): Promise<Outcome<T>> {
        if (reborn !== null) {
            const saved = await this.commit(plant, reborn);
            if (saved.error !== null) return fail(saved.error);
        }
        return fail(error);
    }
}
