import { parseUserId, runScript, usage } from './cli';

const [rawId, password] = process.argv.slice(2);

if (!rawId || !password) {
    usage('tsx scripts/setPassword.ts <userId> <password>');
}

void runScript(async ({ credentials }) => {
    const userId = parseUserId(rawId);
    await credentials.setPassword(userId, password);

    console.log(`✅ Password set successfully for user ID ${userId}`);
    console.log('   All existing sessions of this user were signed out.');
});
