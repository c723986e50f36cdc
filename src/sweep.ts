import { Garden } from './classes/Garden';
import { PlantEngine } from './classes/PlantEngine';
import { SeededRandom } from './classes/Random';
import { SupabaseEconomy } from './classes/SupabaseEconomy';
import { SupabasePlantRepository } from './classes/SupabasePlantRepository';
import { loadConfig } from './config';
import { createSupabase } from './supabaseClient';

// Replaces plants that died of neglect. Meant for a cron/scheduled job;
// the same replacement happens lazily on the owner's next visit.
async function main() {
    const config = loadConfig();
    const supabase = createSupabase(config);

    const garden = new Garden({
        engine: new PlantEngine(config.lifecycle, new SeededRandom(config.randomSeed)),
        repository: new SupabasePlantRepository(supabase),
        economy: new SupabaseEconomy(supabase)
    });

    const swept = await garden.sweepDead();
    if (swept.error !== null) {
        console.error('[Sweep] Failed:', swept.error.message);
        process.exitCode = 1;
        return;
    }
    if (swept.data.failures.length > 0) {
        process.exitCode = 1;
    }
}

main().catch(err => {
    console.error('[Sweep] Crashed:', err);
    process.exitCode = 1;
});
