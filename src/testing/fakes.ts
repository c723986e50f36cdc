import { weightedIndex } from '../classes/Random';
import { ok, reject } from '../outcome';
import type {
    Clock,
    Economy,
    GenerationRecord,
    LeaderboardEntry,
    Outcome,
    PlantRepository,
    PlantState,
    RandomSource,
    Rejection,
    Timestamp
} from '../types';

export function unwrap<T>(outcome: Outcome<T>): T {
    if (outcome.error !== null) {
        throw new Error(`Unexpected ${outcome.error.kind}: ${outcome.error.message}`);
    }
    return outcome.data;
}

export function rejection<T>(outcome: Outcome<T>): Rejection {
    if (outcome.error === null) {
        throw new Error('Expected a rejection');
    }
    return outcome.error;
}

export class ManualClock implements Clock {
    public time: Timestamp;

    constructor(time: Timestamp) {
        this.time = time;
    }

    public now(): Timestamp {
        return this.time;
    }

    public advance(ms: number): void {
        this.time += ms;
    }
}

/**
 * Replays the given uniform draws in order, then keeps returning `fallback`.
 */
export class ScriptedRandom implements RandomSource {
    private queue: number[];
    private fallback: number;

    constructor(draws: number[] = [], fallback: number = 0.99) {
        this.queue = [...draws];
        this.fallback = fallback;
    }

    public push(...draws: number[]): void {
        this.queue.push(...draws);
    }

    public next(): number {
        return this.queue.shift() ?? this.fallback;
    }

    public weightedChoice(weights: readonly number[]): number {
        return weightedIndex(weights, this.next());
    }

    public bernoulli(p: number): boolean {
        return this.next() < p;
    }

    public integer(min: number, max: number): number {
        return min + Math.floor(this.next() * (max - min + 1));
    }
}

export class InMemoryPlantRepository implements PlantRepository {
    public plants = new Map<string, PlantState>();
    public generations: GenerationRecord[] = [];

    public async loadPlant(ownerId: string): Promise<Outcome<PlantState | null>> {
        return ok(this.plants.get(ownerId) ?? null);
    }

    public async savePlant(plant: PlantState): Promise<Outcome<PlantState>> {
        const stored = this.plants.get(plant.ownerId);
        if (plant.version === 0 ? stored !== undefined : stored?.version !== plant.version) {
            return reject('Conflict', 'version mismatch');
        }
        const saved = { ...plant, version: plant.version + 1 };
        this.plants.set(plant.ownerId, saved);
        return ok(saved);
    }

    public async listPlants(): Promise<Outcome<PlantState[]>> {
        return ok([...this.plants.values()]);
    }

    public async lastVisitorWatering(actorId: string): Promise<Outcome<Timestamp | null>> {
        let latest: Timestamp | null = null;
        for (const plant of this.plants.values()) {
            if (plant.wateredBy !== actorId || plant.ownerId === actorId) continue;
            latest = latest === null ? plant.wateredAt : Math.max(latest, plant.wateredAt);
        }
        return ok(latest);
    }

    public async recordGenerationResult(record: GenerationRecord): Promise<Outcome<GenerationRecord>> {
        const existing = this.generations.find(r => r.ownerId === record.ownerId && r.generation === record.generation);
        if (existing !== undefined) return ok(existing);
        this.generations.push(record);
        return ok(record);
    }

    public async listTopScores(limit: number): Promise<Outcome<LeaderboardEntry[]>> {
        const top = [...this.plants.values()]
            .sort((a, b) => b.score - a.score)
            .slice(0, limit)
            .map(p => ({ ownerId: p.ownerId, name: p.name, score: p.score, generation: p.generation }));
        return ok(top);
    }
}

export class FakeEconomy implements Economy {
    public fences = new Set<string>();
    private inventory = new Map<string, Map<string, number>>();

    public quantity(actorId: string, item: string): number {
        return this.inventory.get(actorId)?.get(item) ?? 0;
    }

    public give(actorId: string, item: string, quantity: number): number {
        const bag = this.inventory.get(actorId) ?? new Map<string, number>();
        const total = (bag.get(item) ?? 0) + quantity;
        bag.set(item, total);
        this.inventory.set(actorId, bag);
        return total;
    }

    public async consumeItem(actorId: string, item: string): Promise<Outcome<boolean>> {
        const held = this.quantity(actorId, item);
        if (held < 1) return ok(false);
        this.give(actorId, item, -1);
        return ok(true);
    }

    public async grantCurrency(actorId: string, amount: number): Promise<Outcome<number>> {
        return ok(this.give(actorId, 'coin', amount));
    }

    public async revokeCurrency(actorId: string, amount: number): Promise<Outcome<number>> {
        return ok(this.give(actorId, 'coin', -amount));
    }

    public async grantItem(actorId: string, item: string): Promise<Outcome<string>> {
        this.give(actorId, item, 1);
        return ok(item);
    }

    public async hasActiveFence(ownerId: string): Promise<Outcome<boolean>> {
        return ok(this.fences.has(ownerId));
    }
}
