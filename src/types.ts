export enum Stage {
  SEED = 0,
  SEEDLING = 1,
  YOUNG = 2,
  MATURE = 3,
  FLOWERING = 4,
  SEED_BEARING = 5
}

export type Timestamp = number; // epoch milliseconds, UTC

export interface PlantState {
  id: string;
  ownerId: string;
  createdAt: Timestamp;
  updatedAt: Timestamp; // last growth accrual
  wateredAt: Timestamp;
  wateredBy: string | null;
  generation: number;
  growthRate: number;
  score: number;
  stage: Stage;
  species: number;
  color: number;
  rarity: number;
  mutation: number | null;
  name: string;
  renamedAt: Timestamp | null;
  fertilizedAt: Timestamp | null;
  shakenAt: Timestamp | null;
  searchDay: string | null; // YYYY-MM-DD (UTC)
  searchCount: number;
  version: number;
}

export interface LifecycleConfig {
  stageCutoffs: readonly number[];
  waterDurationMs: number;
  waterCooldownMs: number;
  waterScoreReward: number;
  visitorWaterCoins: number;
  visitorWaterCooldownMs: number; // one watering can per visitor, across every garden
  wiltAfterMs: number;
  deathAfterMs: number;
  fertilizerDurationMs: number;
  fertilizerBonus: number;
  shakeCooldownMs: number;
  shakeCoins: { min: number; max: number };
  floweringStage: Stage;
  searchDailyCap: number;
  searchFindChance: number;
  renameCooldownMs: number;
  nameMaxLength: number;
  growthRateBonus: number;
  mutationChance: number;
}

// --- OUTCOMES ---

export type RejectionKind =
  | 'AlreadyWatered'
  | 'AlreadyFertilized'
  | 'OnCooldown'
  | 'WrongStage'
  | 'InvalidName'
  | 'InsufficientFunds'
  | 'NotOwner'
  | 'Fenced'
  | 'PlantDead'
  | 'Unconfirmed'
  | 'NoPlant'
  | 'PlantExists'
  | 'Conflict'
  | 'StorageFailure';

export interface Rejection {
  kind: RejectionKind;
  message: string;
  retryAt?: Timestamp;
}

/**
 * Result of every fallible operation. Shaped like the Supabase client's
 * `{ data, error }`: check `error` before reading `data`.
 */
export type Outcome<T> =
  | { data: T; error: null }
  | { data: null; error: Rejection };

export interface ActionContext {
  actorId: string;
  fenceActive?: boolean; // owner's fence, blocks visitors from watering/fertilizing
  wateringCanUsedAt?: Timestamp | null; // actor's latest watering of someone else's plant
}

export interface GenerationRecord {
  ownerId: string;
  plantId: string;
  generation: number;
  score: number;
  forced: boolean;
  endedAt: Timestamp;
}

export interface Lineage {
  generation: number;
  growthRate: number;
}

export interface WaterResult {
  plant: PlantState;
  visitorCoins: number;
}

export interface ShakeResult {
  plant: PlantState;
  coins: number;
}

export interface SearchResult {
  plant: PlantState;
  petal: string | null; // item key, e.g. "petal:red"
}

export interface HarvestResult {
  plant: PlantState;
  record: GenerationRecord;
}

export interface SettleResult {
  plant: PlantState;
  reborn: GenerationRecord | null;
}

// --- COLLABORATORS ---

export interface Clock {
  now(): Timestamp;
}

export interface RandomSource {
  next(): number; // uniform in [0, 1)
  weightedChoice(weights: readonly number[]): number;
  bernoulli(p: number): boolean;
  integer(min: number, max: number): number; // inclusive
}

export interface PlantRepository {
  loadPlant(ownerId: string): Promise<Outcome<PlantState | null>>;
  /** Insert when `version` is 0, otherwise update only if the stored version still matches. */
  savePlant(plant: PlantState): Promise<Outcome<PlantState>>;
  listPlants(): Promise<Outcome<PlantState[]>>;
  /** When `actorId` last watered a plant they don't own, or null. */
  lastVisitorWatering(actorId: string): Promise<Outcome<Timestamp | null>>;
  /** Idempotent per (ownerId, generation). */
  recordGenerationResult(record: GenerationRecord): Promise<Outcome<GenerationRecord>>;
  listTopScores(limit: number): Promise<Outcome<LeaderboardEntry[]>>;
}

export interface Economy {
  consumeItem(actorId: string, item: string): Promise<Outcome<boolean>>;
  grantCurrency(actorId: string, amount: number): Promise<Outcome<number>>;
  revokeCurrency(actorId: string, amount: number): Promise<Outcome<number>>;
  grantItem(actorId: string, item: string): Promise<Outcome<string>>;
  hasActiveFence(ownerId: string): Promise<Outcome<boolean>>;
}

export interface LeaderboardEntry {
  ownerId: string;
  name: string;
  score: number;
  generation: number;
}

// --- VIEW ---

export type HealthLabel = 'healthy' | 'dry' | 'wilting' | 'dead';

export interface PlantView extends PlantState {
  stageName: string;
  speciesName: string;
  colorName: string;
  colorHex: number | null;
  rarityName: string;
  mutationName: string | null;
  description: string;
  age: number;
  isWilted: boolean;
  isDead: boolean;
  neglectedDays: number;
  health: HealthLabel;
  waterPercent: number;
  fertilizerPercent: number;
  waterGauge: string;
  fertilizerGauge: string;
  fenceGauge: string | null;
  nextStageProgress: number | null;
  canHarvest: boolean;
  canSearch: boolean;
}
