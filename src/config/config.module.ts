import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TELEMETRY_CONFIG, getTelemetryConfig } from './telemetry.config';

@Global()
@Module({
  providers: [
    {
      provide: TELEMETRY_CONFIG,
      useFactory: (configService: ConfigService) => getTelemetryConfig(configService),
      inject: [ConfigService],
    },
  ],
  exports: [TELEMETRY_CONFIG],
})
export class TelemetryConfigModule {}
