import { parseUserId, runScript, usage } from './cli';

const [rawId, flag] = process.argv.slice(2);

if (!rawId || (flag !== undefined && flag !== '--activate')) {
    usage('tsx scripts/deactivateUser.ts <userId> [--activate]');
}

void runScript(async ({ credentials }) => {
    const userId = parseUserId(rawId);
    const active = flag === '--activate';
    await credentials.setActive(userId, active);

    if (active) {
        console.log(`✅ User ${userId} activated`);
    } else {
        console.log(`✅ User ${userId} deactivated; their sessions were revoked`);
    }
});
