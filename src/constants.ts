import { Color } from 'three';
import traits from './data/traits.json';
import { type LifecycleConfig, Stage } from './types';

export const SECOND = 1000;
export const HOUR = 60 * 60 * SECOND;
export const DAY = 24 * HOUR;

// Trait tables
export const STAGES: readonly string[] = traits.stages;
export const SPECIES: readonly string[] = traits.species.map(s => s.name);
export const SPECIES_WEIGHTS: readonly number[] = traits.species.map(s => s.weight);
export const COLORS: readonly string[] = traits.colors.map(c => c.name);
export const COLOR_WEIGHTS: readonly number[] = traits.colors.map(c => c.weight);
export const COLORS_PLAIN: readonly string[] = COLORS.filter(c => c !== 'rainbow');
export const RARITIES: readonly string[] = traits.rarities.map(r => r.name);
export const RARITY_WEIGHTS: readonly number[] = traits.rarities.map(r => r.weight);
export const MUTATIONS: readonly string[] = traits.mutations;
export const DEFAULT_NAMES: readonly string[] = traits.names;

export const FINAL_STAGE = Stage.SEED_BEARING;

// Items consumed/granted through the economy
export const ITEM_FERTILIZER = 'fertilizer';
export const PETAL_PREFIX = 'petal:';

// Gauges
export const WATER_BAR = '█';
export const FERTILIZER_BAR = '▞';
export const GAUGE_WIDTH = 10;
export const FENCE_ART = 't-+-t-+-t-+-t-+-t';

// Display colors (rainbow has no single hex)
export const COLOR_HEX: Readonly<Record<string, number>> = Object.fromEntries(
    COLORS_PLAIN.map(name => [name, new Color(name).getHex()])
);

export const DEFAULT_LIFECYCLE: LifecycleConfig = {
    // Score points are watered seconds at growth rate 1.0
    stageCutoffs: [0, 1, 3, 10, 20, 30].map(days => days * DAY / SECOND),
    waterDurationMs: DAY,
    waterCooldownMs: DAY,
    waterScoreReward: 60,
    visitorWaterCoins: 1,
    visitorWaterCooldownMs: 8 * HOUR,
    wiltAfterMs: 3 * DAY,
    deathAfterMs: 5 * DAY,
    fertilizerDurationMs: 3 * DAY,
    fertilizerBonus: 0.5,
    shakeCooldownMs: 4 * HOUR,
    shakeCoins: { min: 1, max: 5 },
    floweringStage: Stage.FLOWERING,
    searchDailyCap: 3,
    searchFindChance: 0.75,
    renameCooldownMs: DAY,
    nameMaxLength: 20,
    growthRateBonus: 0.2,
    mutationChance: 0.05
};

export const NAME_PATTERN = /^[A-Za-z0-9 '.-]+$/;
