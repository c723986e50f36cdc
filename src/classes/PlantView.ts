import {
    COLORS,
    COLOR_HEX,
    DAY,
    FENCE_ART,
    FERTILIZER_BAR,
    FINAL_STAGE,
    GAUGE_WIDTH,
    MUTATIONS,
    RARITIES,
    SPECIES,
    STAGES,
    WATER_BAR
} from '../constants';
import { type HealthLabel, type LifecycleConfig, type PlantState, type PlantView, Stage, type Timestamp } from '../types';

// Clock skew reads as "no time has passed"
export function elapsedSince(from: Timestamp, now: Timestamp): number {
    return Math.max(0, now - from);
}

export function isDead(plant: PlantState, now: Timestamp, config: LifecycleConfig): boolean {
    return elapsedSince(plant.wateredAt, now) >= config.deathAfterMs;
}

/** Overdue for water but not yet dead. Exactly at the threshold is still fine. */
export function isWilted(plant: PlantState, now: Timestamp, config: LifecycleConfig): boolean {
    if (isDead(plant, now, config)) return false;
    return elapsedSince(plant.wateredAt, now) > config.wiltAfterMs;
}

export function neglectedDays(plant: PlantState, now: Timestamp, config: LifecycleConfig): number {
    const overdue = elapsedSince(plant.wateredAt, now) - config.wiltAfterMs;
    return overdue > 0 ? Math.floor(overdue / DAY) : 0;
}

export function ageInDays(plant: PlantState, now: Timestamp): number {
    return Math.floor(elapsedSince(plant.createdAt, now) / DAY);
}

export function health(plant: PlantState, now: Timestamp, config: LifecycleConfig): HealthLabel {
    const dry = elapsedSince(plant.wateredAt, now);
    if (dry >= config.deathAfterMs) return 'dead';
    if (dry < DAY) return 'healthy';
    if (dry < config.wiltAfterMs) return 'dry';
    return 'wilting';
}

function remainingPercent(start: Timestamp | null, duration: number, now: Timestamp): number {
    if (start === null) return 0;
    const remaining = Math.max(0, 1 - elapsedSince(start, now) / duration);
    return Math.ceil(remaining * 100);
}

export function waterPercent(plant: PlantState, now: Timestamp, config: LifecycleConfig): number {
    return remainingPercent(plant.wateredAt, config.waterDurationMs, now);
}

export function fertilizerPercent(plant: PlantState, now: Timestamp, config: LifecycleConfig): number {
    return remainingPercent(plant.fertilizedAt, config.fertilizerDurationMs, now);
}

export function renderGauge(percent: number, bar: string): string {
    return `|${bar.repeat(Math.floor(percent / 10)).padEnd(GAUGE_WIDTH)}| ${percent}%`;
}

/**
 * Single-line label. Traits reveal themselves as the plant grows: species
 * from the young stage, rarity from mature, color from flowering.
 */
export function describe(plant: PlantState, dead: boolean): string {
    const words: string[] = [];
    if (plant.stage > Stage.YOUNG) words.push(RARITIES[plant.rarity]);
    if (plant.mutation !== null) words.push(MUTATIONS[plant.mutation]);
    if (plant.stage > Stage.MATURE) words.push(COLORS[plant.color]);
    words.push(STAGES[plant.stage]);
    if (plant.stage > Stage.SEEDLING) words.push(SPECIES[plant.species]);
    if (dead) words.push('(deceased)');
    return words.join(' ');
}

export function nextStageProgress(plant: PlantState, config: LifecycleConfig): number | null {
    if (plant.stage >= FINAL_STAGE) return null;
    const from = config.stageCutoffs[plant.stage];
    const to = config.stageCutoffs[plant.stage + 1];
    return Math.min(1, Math.max(0, (plant.score - from) / (to - from)));
}

export function viewPlant(
    plant: PlantState,
    now: Timestamp,
    config: LifecycleConfig,
    options: { fenceActive?: boolean } = {}
): PlantView {
    const dead = isDead(plant, now, config);
    const water = waterPercent(plant, now, config);
    const fertilizer = fertilizerPercent(plant, now, config);
    const colorName = COLORS[plant.color];

    return {
        ...plant,
        stageName: STAGES[plant.stage],
        speciesName: SPECIES[plant.species],
        colorName,
        colorHex: COLOR_HEX[colorName] ?? null,
        rarityName: RARITIES[plant.rarity],
        mutationName: plant.mutation === null ? null : MUTATIONS[plant.mutation],
        description: describe(plant, dead),
        age: ageInDays(plant, now),
        isWilted: isWilted(plant, now, config),
        isDead: dead,
        neglectedDays: neglectedDays(plant, now, config),
        health: health(plant, now, config),
        waterPercent: water,
        fertilizerPercent: fertilizer,
        waterGauge: dead ? 'N/A' : renderGauge(water, WATER_BAR),
        fertilizerGauge: dead ? 'N/A' : renderGauge(fertilizer, FERTILIZER_BAR),
        fenceGauge: options.fenceActive ? FENCE_ART : null,
        nextStageProgress: nextStageProgress(plant, config),
        canHarvest: dead || plant.stage === FINAL_STAGE,
        canSearch: !dead && plant.stage >= config.floweringStage
    };
}
