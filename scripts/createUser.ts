import { runScript, usage } from './cli';

const [username, email, password] = process.argv.slice(2);

if (!username || !email || !password) {
    usage('tsx scripts/createUser.ts <username> <email> <password>');
}

void runScript(async ({ credentials }) => {
    const user = await credentials.createUser(username, email, password);

    console.log('✅ User created successfully!');
    console.log(`   ID: ${user.id}`);
    console.log(`   Username: ${user.username}`);
    console.log(`   Email: ${user.email}`);
    console.log(`   Active: ${user.isActive ? 'Yes' : 'No'}`);
});
