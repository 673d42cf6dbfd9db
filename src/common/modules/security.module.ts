import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { INJECTION_TOKENS } from '../constants/injection-tokens';
import { HashingService } from '../services/hashing.service';

const securityProviders = [
    {
        provide: INJECTION_TOKENS.HASHING_SERVICE,
        useClass: HashingService,
    },
];

@Global()
@Module({
    imports: [ConfigModule],
    providers: securityProviders,
    exports: [INJECTION_TOKENS.HASHING_SERVICE],
})
export class SecurityModule {}
