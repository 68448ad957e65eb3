import { runScript } from './cli';

void runScript(async ({ credentials }) => {
    console.log('👥 Listing all users in the database...\n');

    const users = await credentials.listUsers();

    if (users.length === 0) {
        console.log('📭 No users found in the database');
        console.log('💡 Run: npm run user:create -- <username> <email> <password>');
        return;
    }

    console.log(`📊 Found ${users.length} user(s):\n`);

    users.forEach((user, index) => {
        console.log(`${index + 1}. User Details:`);
        console.log(`   ID: ${user.id}`);
        console.log(`   Username: "${user.username}"`);
        console.log(`   Email: ${user.email}`);
        console.log(`   Active: ${user.isActive ? '✅ Yes' : '❌ No'}`);
        console.log(`   Created: ${user.createdAt.toISOString()}`);
        console.log(`   Last Login: ${user.lastLogin ? user.lastLogin.toISOString() : 'Never'}`);
        console.log('');
    });
});
