import { HttpModule } from '@nestjs/axios';
import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CircuitBreakerService } from './circuit-breaker/circuit-breaker.service';
import { AdminSecretGuard } from './guards/admin-secret.guard';
import { PayloadValidatorService } from './validation/payload-validator.service';

@Global()
@Module({
  imports: [
    ConfigModule,
    HttpModule.register({
      timeout: 10000,
      maxRedirects: 5,
    }),
  ],
  providers: [CircuitBreakerService, PayloadValidatorService, AdminSecretGuard],
  exports: [
    HttpModule,
    CircuitBreakerService,
    PayloadValidatorService,
    AdminSecretGuard,
  ],
})
export class CoreModule {}
