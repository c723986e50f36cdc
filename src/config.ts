import { z } from 'zod';
import { DEFAULT_LIFECYCLE, HOUR } from './constants';
import type { LifecycleConfig } from './types';

const hours = z.coerce.number().positive();

const EnvSchema = z.object({
    SUPABASE_URL: z.string().url(),
    SUPABASE_ANON_KEY: z.string().min(1),
    GARDEN_WATER_COOLDOWN_HOURS: hours.optional(),
    GARDEN_VISITOR_WATER_COOLDOWN_HOURS: hours.optional(),
    GARDEN_SHAKE_COOLDOWN_HOURS: hours.optional(),
    GARDEN_RENAME_COOLDOWN_HOURS: hours.optional(),
    GARDEN_WILT_AFTER_HOURS: hours.optional(),
    GARDEN_DEATH_AFTER_HOURS: hours.optional(),
    GARDEN_GROWTH_RATE_BONUS: z.coerce.number().nonnegative().optional(),
    GARDEN_MUTATION_CHANCE: z.coerce.number().min(0).max(1).optional(),
    GARDEN_SEARCH_DAILY_CAP: z.coerce.number().int().positive().optional(),
    GARDEN_RANDOM_SEED: z.coerce.number().int().optional()
});

type Env = z.infer<typeof EnvSchema>;

export interface AppConfig {
    supabaseUrl: string;
    supabaseAnonKey: string;
    lifecycle: LifecycleConfig;
    randomSeed?: number;
}

const toMs = (h: number | undefined, fallback: number) => (h === undefined ? fallback : h * HOUR);

export function lifecycleFromEnv(env: Env): LifecycleConfig {
    const lifecycle: LifecycleConfig = {
        ...DEFAULT_LIFECYCLE,
        waterCooldownMs: toMs(env.GARDEN_WATER_COOLDOWN_HOURS, DEFAULT_LIFECYCLE.waterCooldownMs),
        visitorWaterCooldownMs: toMs(env.GARDEN_VISITOR_WATER_COOLDOWN_HOURS, DEFAULT_LIFECYCLE.visitorWaterCooldownMs),
        shakeCooldownMs: toMs(env.GARDEN_SHAKE_COOLDOWN_HOURS, DEFAULT_LIFECYCLE.shakeCooldownMs),
        renameCooldownMs: toMs(env.GARDEN_RENAME_COOLDOWN_HOURS, DEFAULT_LIFECYCLE.renameCooldownMs),
        wiltAfterMs: toMs(env.GARDEN_WILT_AFTER_HOURS, DEFAULT_LIFECYCLE.wiltAfterMs),
        deathAfterMs: toMs(env.GARDEN_DEATH_AFTER_HOURS, DEFAULT_LIFECYCLE.deathAfterMs),
        growthRateBonus: env.GARDEN_GROWTH_RATE_BONUS ?? DEFAULT_LIFECYCLE.growthRateBonus,
        mutationChance: env.GARDEN_MUTATION_CHANCE ?? DEFAULT_LIFECYCLE.mutationChance,
        searchDailyCap: env.GARDEN_SEARCH_DAILY_CAP ?? DEFAULT_LIFECYCLE.searchDailyCap
    };

    if (lifecycle.deathAfterMs <= lifecycle.wiltAfterMs) {
        throw new Error('[Config] GARDEN_DEATH_AFTER_HOURS must be later than GARDEN_WILT_AFTER_HOURS');
    }
    return lifecycle;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(source);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new Error(`[Config] Invalid environment: ${issues}`);
    }
    const env = parsed.data;
    return {
        supabaseUrl: env.SUPABASE_URL,
        supabaseAnonKey: env.SUPABASE_ANON_KEY,
        lifecycle: lifecycleFromEnv(env),
        randomSeed: env.GARDEN_RANDOM_SEED
    };
}
