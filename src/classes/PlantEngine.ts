import { randomUUID } from 'node:crypto';
import {
    COLORS,
    COLORS_PLAIN,
    COLOR_WEIGHTS,
    DAY,
    DEFAULT_LIFECYCLE,
    DEFAULT_NAMES,
    FINAL_STAGE,
    MUTATIONS,
    NAME_PATTERN,
    PETAL_PREFIX,
    RARITY_WEIGHTS,
    SECOND,
    SPECIES_WEIGHTS
} from '../constants';
import { ok, reject } from '../outcome';
import {
    type ActionContext,
    type GenerationRecord,
    type HarvestResult,
    type LifecycleConfig,
    type Lineage,
    type Outcome,
    type PlantState,
    type RandomSource,
    type SearchResult,
    type SettleResult,
    type ShakeResult,
    Stage,
    type Timestamp,
    type WaterResult
} from '../types';
import { SeededRandom } from './Random';
import { isDead } from './PlantView';

const FIRST_LINEAGE: Lineage = { generation: 0, growthRate: 1 };

/**
 * Stateless lifecycle rules for a single plant. Every operation takes the
 * current state and the caller's `now` and returns a new state; inputs are
 * never mutated. Callers serialize actions per plant.
 */
export class PlantEngine {
    public readonly config: LifecycleConfig;
    private random: RandomSource;

    constructor(config: LifecycleConfig = DEFAULT_LIFECYCLE, random: RandomSource = new SeededRandom()) {
        this.config = config;
        this.random = random;
    }

    // --- CREATION ---

    public createPlant(ownerId: string, now: Timestamp, lineage: Lineage = FIRST_LINEAGE): PlantState {
        // Roll order is fixed so a seeded source replays the same plant
        const species = this.random.weightedChoice(SPECIES_WEIGHTS);
        const color = this.random.weightedChoice(COLOR_WEIGHTS);
        const rarity = this.random.weightedChoice(RARITY_WEIGHTS);
        const mutation = this.random.bernoulli(this.config.mutationChance)
            ? this.random.integer(0, MUTATIONS.length - 1)
            : null;
        const name = DEFAULT_NAMES[this.random.integer(0, DEFAULT_NAMES.length - 1)];

        return {
            id: randomUUID(),
            ownerId,
            createdAt: now,
            updatedAt: now,
            wateredAt: now,
            wateredBy: null,
            generation: lineage.generation,
            growthRate: lineage.growthRate,
            score: 0,
            stage: Stage.SEED,
            species,
            color,
            rarity,
            mutation,
            name,
            renamedAt: null,
            fertilizedAt: null,
            shakenAt: null,
            searchDay: null,
            searchCount: 0,
            version: 0
        };
    }

    /** A freshly adopted plant starts dry, so the owner's first watering starts its clock. */
    public plantSeed(ownerId: string, now: Timestamp): PlantState {
        return { ...this.createPlant(ownerId, now), wateredAt: now - this.config.waterDurationMs };
    }

    // --- TIME ---

    /**
     * Accrue growth since the last refresh. A point per second while the
     * soil is damp, boosted inside the fertilizer window, scaled by the
     * generation's growth rate.
     */
    public refresh(plant: PlantState, now: Timestamp): PlantState {
        const last = plant.updatedAt;
        const updatedAt = Math.max(last, now);

        // Accrual stops when the soil dries, long before the plant can die
        const dampUntil = plant.wateredAt + this.config.waterDurationMs;
        const start = Math.max(plant.wateredAt, last);
        const end = Math.min(dampUntil, now);
        let ticks = Math.max(0, end - start) / SECOND;

        if (plant.fertilizedAt !== null) {
            const bonusStart = Math.max(plant.fertilizedAt, last, plant.wateredAt);
            const bonusEnd = Math.min(plant.fertilizedAt + this.config.fertilizerDurationMs, dampUntil, now);
            ticks += (Math.max(0, bonusEnd - bonusStart) / SECOND) * this.config.fertilizerBonus;
        }

        // epsilon keeps 43200 * 1.2 from flooring to 51839
        const points = Math.floor(ticks * plant.growthRate + 1e-6);
        const score = plant.score + points;

        return { ...plant, updatedAt, score, stage: this.stageFor(plant.stage, score) };
    }

    /** Refresh, and replace a dead plant with its next generation. */
    public settle(plant: PlantState, now: Timestamp): SettleResult {
        const refreshed = this.refresh(plant, now);
        if (!isDead(refreshed, now, this.config)) {
            return { plant: refreshed, reborn: null };
        }
        const { plant: next, record } = this.rebirth(refreshed, now, true);
        return { plant: next, reborn: record };
    }

    // --- ACTIONS ---

    public water(plant: PlantState, ctx: ActionContext, now: Timestamp): Outcome<WaterResult> {
        if (isDead(plant, now, this.config)) {
            return reject('PlantDead', "There's no point in watering a dead plant.");
        }
        const visitor = ctx.actorId !== plant.ownerId;
        if (visitor && ctx.fenceActive) {
            return reject('Fenced', 'The fence stops you from watering.');
        }
        const readyAt = plant.wateredAt + this.config.waterCooldownMs;
        if (now < readyAt) {
            return reject('AlreadyWatered', 'The soil is already damp.', readyAt);
        }
        const canUsedAt = ctx.wateringCanUsedAt ?? null;
        if (visitor && canUsedAt !== null) {
            const refilledAt = canUsedAt + this.config.visitorWaterCooldownMs;
            if (now < refilledAt) {
                return reject('OnCooldown', 'Your watering can is empty, try again later!', refilledAt);
            }
        }

        const refreshed = this.refresh(plant, now);
        const score = refreshed.score + this.config.waterScoreReward;

        return ok({
            plant: {
                ...refreshed,
                wateredAt: now,
                wateredBy: ctx.actorId,
                score,
                stage: this.stageFor(refreshed.stage, score)
            },
            visitorCoins: visitor ? this.config.visitorWaterCoins : 0
        });
    }

    public fertilize(plant: PlantState, ctx: ActionContext, now: Timestamp): Outcome<PlantState> {
        if (isDead(plant, now, this.config)) {
            return reject('PlantDead', 'Fertilizer will not help a dead plant.');
        }
        if (ctx.actorId !== plant.ownerId && ctx.fenceActive) {
            return reject('Fenced', 'The fence stops you from fertilizing.');
        }
        if (plant.fertilizedAt !== null) {
            const expiresAt = plant.fertilizedAt + this.config.fertilizerDurationMs;
            if (now < expiresAt) {
                return reject('AlreadyFertilized', 'The soil is still rich with nutrients.', expiresAt);
            }
        }

        // Settle growth under the old window before opening a new one
        return ok({ ...this.refresh(plant, now), fertilizedAt: now });
    }

    public shake(plant: PlantState, ctx: ActionContext, now: Timestamp): Outcome<ShakeResult> {
        if (ctx.actorId !== plant.ownerId) {
            return reject('NotOwner', 'You can only shake your own plant.');
        }
        if (isDead(plant, now, this.config)) {
            return reject('PlantDead', 'Nothing falls from a dead plant.');
        }
        if (plant.shakenAt !== null) {
            const readyAt = plant.shakenAt + this.config.shakeCooldownMs;
            if (now < readyAt) {
                return reject('OnCooldown', 'The leaves are still settling, try again later.', readyAt);
            }
        }

        const { min, max } = this.config.shakeCoins;
        const coins = this.random.integer(min, max);
        return ok({ plant: { ...this.refresh(plant, now), shakenAt: now }, coins });
    }

    public search(plant: PlantState, ctx: ActionContext, now: Timestamp): Outcome<SearchResult> {
        if (isDead(plant, now, this.config)) {
            return reject('PlantDead', "You shouldn't be here!");
        }
        const refreshed = this.refresh(plant, now);
        if (refreshed.stage < this.config.floweringStage) {
            return reject('WrongStage', 'There are no petals to find yet.');
        }

        const day = utcDay(now);
        const count = refreshed.searchDay === day ? refreshed.searchCount : 0;
        if (count >= this.config.searchDailyCap) {
            return reject('OnCooldown', 'The ground around this plant is bare, come back tomorrow!', nextUtcMidnight(now));
        }

        const petal = this.random.bernoulli(this.config.searchFindChance)
            ? PETAL_PREFIX + this.petalColor(refreshed)
            : null;

        if (petal) {
            console.log(`[PlantEngine] ${ctx.actorId} found ${petal} near plant ${plant.id}`);
        }

        return ok({ plant: { ...refreshed, searchDay: day, searchCount: count + 1 }, petal });
    }

    public rename(plant: PlantState, ctx: ActionContext, name: string, now: Timestamp): Outcome<PlantState> {
        if (ctx.actorId !== plant.ownerId) {
            return reject('NotOwner', "You can't rename someone else's plant.");
        }
        if (isDead(plant, now, this.config)) {
            return reject('PlantDead', 'The plant is past caring what you call it.');
        }
        if (plant.renamedAt !== null) {
            const readyAt = plant.renamedAt + this.config.renameCooldownMs;
            if (now < readyAt) {
                return reject('OnCooldown', 'Your plant is still getting used to its new name.', readyAt);
            }
        }

        const trimmed = name.trim();
        if (trimmed.length === 0 || trimmed.length > this.config.nameMaxLength || !NAME_PATTERN.test(trimmed)) {
            return reject(
                'InvalidName',
                `Names must be 1-${this.config.nameMaxLength} letters, digits, spaces, apostrophes, dashes or dots.`
            );
        }

        return ok({ ...plant, name: trimmed, renamedAt: now });
    }

    public harvest(plant: PlantState, ctx: ActionContext, confirm: boolean, now: Timestamp): Outcome<HarvestResult> {
        if (ctx.actorId !== plant.ownerId) {
            return reject('NotOwner', "You can't harvest someone else's plant.");
        }
        if (!confirm) {
            return reject('Unconfirmed', 'Harvesting replaces your plant with a new seed. Confirm to continue.');
        }

        const refreshed = this.refresh(plant, now);
        const dead = isDead(refreshed, now, this.config);
        if (!dead && refreshed.stage !== FINAL_STAGE) {
            return reject('WrongStage', "Your plant isn't ready to harvest.");
        }

        return ok(this.rebirth(refreshed, now, dead));
    }

    // --- GENERATIONS ---

    private rebirth(plant: PlantState, now: Timestamp, forced: boolean): HarvestResult {
        const record: GenerationRecord = {
            ownerId: plant.ownerId,
            plantId: plant.id,
            generation: plant.generation,
            score: plant.score,
            forced,
            endedAt: now
        };
        const growthRate = forced ? plant.growthRate : plant.growthRate + this.config.growthRateBonus;
        const next = this.createPlant(plant.ownerId, now, { generation: plant.generation + 1, growthRate });

        // Same owner row, so the optimistic version carries over
        return { plant: { ...next, version: plant.version }, record };
    }

    private stageFor(current: Stage, score: number): Stage {
        let stage = current;
        while (stage < FINAL_STAGE && score >= this.config.stageCutoffs[stage + 1]) {
            stage++;
        }
        return stage;
    }

    private petalColor(plant: PlantState): string {
        const color = COLORS[plant.color];
        if (color !== 'rainbow') return color;
        return COLORS_PLAIN[this.random.integer(0, COLORS_PLAIN.length - 1)];
    }
}

export function utcDay(now: Timestamp): string {
    return new Date(now).toISOString().slice(0, 10);
}

export function nextUtcMidnight(now: Timestamp): Timestamp {
    return Math.floor(now / DAY) * DAY + DAY;
}
