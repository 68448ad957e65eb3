import { runMigrations } from '../src/db/migrate';
import { runScript } from './cli';

void runScript(async ({ database }) => {
    const applied = await runMigrations(database.sql);
    console.log(applied.length > 0 ? `✅ Applied: ${applied.join(', ')}` : '✅ Nothing to apply');
});
