import { ConfigService } from '@nestjs/config';
import { HashingService } from '../../src/common/services/hashing.service';
import { createTestConfig } from '../support/test-config';

describe('HashingService', () => {
    const service = new HashingService(createTestConfig());

    it('hashes with argon2id and verifies the result', async () => {
        const hash = await service.hash('Secure*Password1');

        expect(hash).toMatch(/^\$argon2id\$v=19\$m=4096,t=2,p=1\$/);
        await expect(service.verify('Secure*Password1', hash)).resolves.toBe(true);
        await expect(service.verify('Other*Password1', hash)).resolves.toBe(false);
    });

    it('salts every hash', async () => {
        const [first, second] = await Promise.all([
            service.hash('Secure*Password1'),
            service.hash('Secure*Password1'),
        ]);

        expect(first).not.toBe(second);
    });

    it('refuses blank input', async () => {
        await expect(service.hash('   ')).rejects.toThrow('Invalid input for hashing');
    });

    it('treats a malformed stored hash as a mismatch', async () => {
        await expect(service.verify('Secure*Password1', 'not-a-hash')).resolves.toBe(false);
    });

    it('falls back to default costs for invalid settings', async () => {
        const fallback = new HashingService(
            new ConfigService({
                security: { argon2: { memoryCost: 'lots', timeCost: 0, parallelism: -1 } },
            }),
        );

        await expect(fallback.hash('Secure*Password1')).resolves.toMatch(
            /^\$argon2id\$v=19\$m=65536,t=3,p=4\$/,
        );
    });
});
