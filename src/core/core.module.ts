import { HttpModule } from '@nestjs/axios';
import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CircuitBreakerService } from './circuit-breaker/circuit-breaker.service';
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
  providers: [CircuitBreakerService, PayloadValidatorService],
  exports: [HttpModule, CircuitBreakerService, PayloadValidatorService],
})
export class CoreModule {}
