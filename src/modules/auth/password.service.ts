import * as argon2 from 'argon2';
import type { PasswordHashConfig } from '../../config';

const DUMMY_SECRET = 'dummy-password-for-timing-equalization';

/**
 * argon2id hashing. The PHC output embeds salt and cost parameters,
 * so no separate salt column is needed.
 */
export class PasswordService {
    private dummyHashPromise?: Promise<string>;

    constructor(private readonly params: PasswordHashConfig) { }

    async hash(plaintext: string): Promise<string> {
        return argon2.hash(plaintext, {
            type: argon2.argon2id,
            memoryCost: this.params.memoryCostKib,
            timeCost: this.params.timeCost,
            parallelism: this.params.parallelism,
        });
    }

    /** Never throws: malformed hashes and mismatches both yield false. */
    async verify(plaintext: string, storedHash: string): Promise<boolean> {
        if (!storedHash.startsWith('$argon2')) {
            return false;
        }
        try {
            return await argon2.verify(storedHash, plaintext);
        } catch {
            return false;
        }
    }

    /**
     * Hash of a throw-away secret with the current parameters. Verifying
     * against it costs the same as verifying a real user's hash.
     */
    dummyHash(): Promise<string> {
        if (!this.dummyHashPromise) {
            this.dummyHashPromise = this.hash(DUMMY_SECRET);
        }
        return this.dummyHashPromise;
    }
}
