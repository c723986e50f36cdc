import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { ok, reject } from '../outcome';
import {
    type GenerationRecord,
    type LeaderboardEntry,
    type Outcome,
    type PlantRepository,
    type PlantState,
    Stage,
    type Timestamp
} from '../types';

const PLANTS = 'plants';
const GENERATIONS = 'plant_generations';
const UNIQUE_VIOLATION = '23505';

const timestamp = z.string().transform((value, ctx) => {
    const ms = Date.parse(value);
    if (Number.isNaN(ms)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid timestamp: ${value}` });
        return z.NEVER;
    }
    return ms;
});

const PlantRowSchema = z.object({
    id: z.string(),
    owner_id: z.string(),
    created_at: timestamp,
    updated_at: timestamp,
    watered_at: timestamp,
    watered_by: z.string().nullable(),
    generation: z.number().int().nonnegative(),
    growth_rate: z.number().positive(),
    score: z.number().int().nonnegative(),
    stage: z.nativeEnum(Stage),
    species: z.number().int().nonnegative(),
    color: z.number().int().nonnegative(),
    rarity: z.number().int().nonnegative(),
    mutation: z.number().int().nonnegative().nullable(),
    name: z.string(),
    renamed_at: timestamp.nullable(),
    fertilized_at: timestamp.nullable(),
    shaken_at: timestamp.nullable(),
    search_day: z.string().nullable(),
    search_count: z.number().int().nonnegative(),
    version: z.number().int().nonnegative()
});

const WateringRowSchema = z.object({ watered_at: timestamp });

const LeaderboardRowSchema = z.object({
    owner_id: z.string(),
    name: z.string(),
    score: z.number(),
    generation: z.number()
});

export interface PlantRow {
    id: string;
    owner_id: string;
    created_at: string;
    updated_at: string;
    watered_at: string;
    watered_by: string | null;
    generation: number;
    growth_rate: number;
    score: number;
    stage: number;
    species: number;
    color: number;
    rarity: number;
    mutation: number | null;
    name: string;
    renamed_at: string | null;
    fertilized_at: string | null;
    shaken_at: string | null;
    search_day: string | null;
    search_count: number;
    version: number;
}

const iso = (ms: number) => new Date(ms).toISOString();
const isoOrNull = (ms: number | null) => (ms === null ? null : iso(ms));

export function plantToRow(plant: PlantState): PlantRow {
    return {
        id: plant.id,
        owner_id: plant.ownerId,
        created_at: iso(plant.createdAt),
        updated_at: iso(plant.updatedAt),
        watered_at: iso(plant.wateredAt),
        watered_by: plant.wateredBy,
        generation: plant.generation,
        growth_rate: plant.growthRate,
        score: plant.score,
        stage: plant.stage,
        species: plant.species,
        color: plant.color,
        rarity: plant.rarity,
        mutation: plant.mutation,
        name: plant.name,
        renamed_at: isoOrNull(plant.renamedAt),
        fertilized_at: isoOrNull(plant.fertilizedAt),
        shaken_at: isoOrNull(plant.shakenAt),
        search_day: plant.searchDay,
        search_count: plant.searchCount,
        version: plant.version
    };
}

export function plantFromRow(row: unknown): Outcome<PlantState> {
    const parsed = PlantRowSchema.safeParse(row);
    if (!parsed.success) {
        return reject('StorageFailure', `Unreadable plant row: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    }
    const r = parsed.data;
    return ok({
        id: r.id,
        ownerId: r.owner_id,
        createdAt: r.created_at,
        updatedAt: r.updated_at,
        wateredAt: r.watered_at,
        wateredBy: r.watered_by,
        generation: r.generation,
        growthRate: r.growth_rate,
        score: r.score,
        stage: r.stage,
        species: r.species,
        color: r.color,
        rarity: r.rarity,
        mutation: r.mutation,
        name: r.name,
        renamedAt: r.renamed_at,
        fertilizedAt: r.fertilized_at,
        shakenAt: r.shaken_at,
        searchDay: r.search_day,
        searchCount: r.search_count,
        version: r.version
    });
}

/**
 * Plants live in one row per owner. Writes are guarded by the `version`
 * column: an update only lands if nobody else saved since we loaded.
 */
export class SupabasePlantRepository implements PlantRepository {
    private supabase: SupabaseClient;

    constructor(supabase: SupabaseClient) {
        this.supabase = supabase;
    }

    public async loadPlant(ownerId: string): Promise<Outcome<PlantState | null>> {
        const { data, error } = await this.supabase
            .from(PLANTS)
            .select('*')
            .eq('owner_id', ownerId)
            .maybeSingle();

        if (error) {
            console.error('[Repository] Failed to load plant:', error.message);
            return reject('StorageFailure', error.message);
        }
        if (data === null) return ok(null);
        return plantFromRow(data);
    }

    public async savePlant(plant: PlantState): Promise<Outcome<PlantState>> {
        const row = { ...plantToRow(plant), version: plant.version + 1 };

        if (plant.version === 0) {
            const { data, error } = await this.supabase.from(PLANTS).insert(row).select().single();
            if (error) {
                if (error.code === UNIQUE_VIOLATION) {
                    return reject('Conflict', 'This account already has a plant.');
                }
                console.error('[Repository] Failed to insert plant:', error.message);
                return reject('StorageFailure', error.message);
            }
            return plantFromRow(data);
        }

        const { data, error } = await this.supabase
            .from(PLANTS)
            .update(row)
            .eq('owner_id', plant.ownerId)
            .eq('version', plant.version)
            .select();

        if (error) {
            console.error('[Repository] Failed to update plant:', error.message);
            return reject('StorageFailure', error.message);
        }
        if (!data || data.length === 0) {
            return reject('Conflict', 'Someone else tended this plant at the same moment, try again.');
        }
        return plantFromRow(data[0]);
    }

    public async listPlants(): Promise<Outcome<PlantState[]>> {
        const { data, error } = await this.supabase
            .from(PLANTS)
            .select('*')
            .order('created_at', { ascending: true });

        if (error) {
            console.error('[Repository] Failed to list plants:', error.message);
            return reject('StorageFailure', error.message);
        }

        const plants: PlantState[] = [];
        for (const row of data ?? []) {
            const parsed = plantFromRow(row);
            if (parsed.error !== null) return reject(parsed.error.kind, parsed.error.message);
            plants.push(parsed.data);
        }
        return ok(plants);
    }

    public async lastVisitorWatering(actorId: string): Promise<Outcome<Timestamp | null>> {
        const { data, error } = await this.supabase
            .from(PLANTS)
            .select('watered_at')
            .eq('watered_by', actorId)
            .neq('owner_id', actorId)
            .order('watered_at', { ascending: false })
            .limit(1)
            .maybeSingle();

        if (error) {
            console.error('[Repository] Failed to look up watering can:', error.message);
            return reject('StorageFailure', error.message);
        }
        if (data === null) return ok(null);

        const parsed = WateringRowSchema.safeParse(data);
        if (!parsed.success) {
            return reject('StorageFailure', 'Unreadable watering row');
        }
        return ok(parsed.data.watered_at);
    }

    /** A retried rebirth finds its generation already recorded and leaves it alone. */
    public async recordGenerationResult(record: GenerationRecord): Promise<Outcome<GenerationRecord>> {
        const { error } = await this.supabase.from(GENERATIONS).upsert(
            {
                owner_id: record.ownerId,
                plant_id: record.plantId,
                generation: record.generation,
                score: record.score,
                forced: record.forced,
                ended_at: iso(record.endedAt)
            },
            { onConflict: 'owner_id,generation', ignoreDuplicates: true }
        );

        if (error) {
            console.error('[Repository] Failed to record generation:', error.message);
            return reject('StorageFailure', error.message);
        }
        return ok(record);
    }

    public async listTopScores(limit: number): Promise<Outcome<LeaderboardEntry[]>> {
        const { data, error } = await this.supabase
            .from(PLANTS)
            .select('owner_id, name, score, generation')
            .order('score', { ascending: false })
            .limit(limit);

        if (error) {
            console.error('[Repository] Failed to load leaderboard:', error.message);
            return reject('StorageFailure', error.message);
        }

        const rows = z.array(LeaderboardRowSchema).safeParse(data ?? []);
        if (!rows.success) {
            return reject('StorageFailure', 'Unreadable leaderboard rows');
        }
        return ok(rows.data.map(r => ({ ownerId: r.owner_id, name: r.name, score: r.score, generation: r.generation })));
    }
}
