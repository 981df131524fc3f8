/**
 * File Credential Store
 * AES-256-GCM encrypted file storage at ~/.allocation-connect/tokens.enc
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as crypto from 'crypto';
import { z } from 'zod';
import type { CredentialSink, PersistedCredentials } from './CredentialSink.js';
import { getConfigDir } from '../utils/config.js';

const ENCRYPTION_ALGORITHM = 'aes-256-gcm';
const TOKEN_FILE_NAME = 'tokens.enc';

const envelopeSchema = z.object({
    iv: z.string(),
    authTag: z.string(),
    data: z.string(),
});

const credentialsSchema = z.object({
    accessToken: z.string().optional(),
    refreshToken: z.string().optional(),
    expiresAt: z.number().optional(),
    lastRefreshTime: z.number().optional(),
    refreshCountToday: z.number().int().nonnegative().optional(),
    refreshDate: z.string().optional(),
});

export class FileStore implements CredentialSink {
    private readonly filePath: string;
    private readonly encryptionKey: Buffer;

    constructor(configDir: string = getConfigDir()) {
        this.filePath = path.join(configDir, TOKEN_FILE_NAME);

        // Derive key from machine-specific data
        const machineId = `${os.hostname()}-${os.userInfo().username}-allocation-connect`;
        this.encryptionKey = crypto.scryptSync(machineId, 'alc-salt-v1', 32);
    }

    async save(credentials: PersistedCredentials): Promise<void> {
        const iv = crypto.randomBytes(16);
        const cipher = crypto.createCipheriv(ENCRYPTION_ALGORITHM, this.encryptionKey, iv);

        const serialized = JSON.stringify(credentials);
        let encrypted = cipher.update(serialized, 'utf8', 'hex');
        encrypted += cipher.final('hex');

        const authTag = cipher.getAuthTag();

        const data = {
            iv: iv.toString('hex'),
            authTag: authTag.toString('hex'),
            data: encrypted,
        };

        await fs.promises.writeFile(this.filePath, JSON.stringify(data), { mode: 0o600 });
    }

    async load(): Promise<PersistedCredentials | null> {
        if (!fs.existsSync(this.filePath)) {
            return null;
        }

        try {
            const content = await fs.promises.readFile(this.filePath, 'utf8');
            const { iv, authTag, data } = envelopeSchema.parse(JSON.parse(content));

            const decipher = crypto.createDecipheriv(
                ENCRYPTION_ALGORITHM,
                this.encryptionKey,
                Buffer.from(iv, 'hex')
            );
            decipher.setAuthTag(Buffer.from(authTag, 'hex'));

            let decrypted = decipher.update(data, 'hex', 'utf8');
            decrypted += decipher.final('utf8');

            return credentialsSchema.parse(JSON.parse(decrypted));
        } catch {
            // Unreadable with this machine's key or corrupted: start over
            await this.clear();
            return null;
        }
    }

    async clear(): Promise<void> {
        if (fs.existsSync(this.filePath)) {
            await fs.promises.unlink(this.filePath);
        }
    }

    async exists(): Promise<boolean> {
        return fs.existsSync(this.filePath);
    }
}
