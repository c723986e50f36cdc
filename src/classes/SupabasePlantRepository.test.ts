import { describe, expect, it } from 'vitest';
import { DEFAULT_LIFECYCLE } from '../constants';
import { rejection, ScriptedRandom, unwrap } from '../testing/fakes';
import { PlantEngine } from './PlantEngine';
import { plantFromRow, plantToRow } from './SupabasePlantRepository';

const T0 = Date.UTC(2026, 0, 1);

function samplePlant() {
    const plant = new PlantEngine(DEFAULT_LIFECYCLE, new ScriptedRandom()).createPlant('owner-1', T0);
    return { ...plant, fertilizedAt: T0 + 1000, searchDay: '2026-01-01', searchCount: 2, version: 3 };
}

describe('plant rows', () => {
    it('stores timestamps as ISO strings and nulls as nulls', () => {
        const row = plantToRow(samplePlant());
        expect(row.owner_id).toBe('owner-1');
        expect(row.created_at).toBe('2026-01-01T00:00:00.000Z');
        expect(row.fertilized_at).toBe('2026-01-01T00:00:01.000Z');
        expect(row.renamed_at).toBeNull();
        expect(row.mutation).toBeNull();
        expect(row.search_day).toBe('2026-01-01');
    });

    it('reads back the plant it wrote', () => {
        const plant = samplePlant();
        expect(unwrap(plantFromRow(plantToRow(plant)))).toEqual(plant);
    });

    it('refuses a row with an unknown stage', () => {
        const error = rejection(plantFromRow({ ...plantToRow(samplePlant()), stage: 9 }));
        expect(error.kind).toBe('StorageFailure');
    });

    it('refuses a row with an unparseable timestamp', () => {
        const error = rejection(plantFromRow({ ...plantToRow(samplePlant()), watered_at: 'yesterday' }));
        expect(error.message).toBe('Unreadable plant row: Invalid timestamp: yesterday');
    });
});
