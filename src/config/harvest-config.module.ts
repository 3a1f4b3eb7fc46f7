import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { CLOCK, SLEEPER, systemClock, timerSleeper } from '@/common/time.util';
import { HARVEST_CONFIG, loadHarvestConfig } from './harvest.config';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: HARVEST_CONFIG,
      useFactory: (cfg: ConfigService) => loadHarvestConfig(cfg),
      inject: [ConfigService],
    },
    { provide: CLOCK, useValue: systemClock },
    { provide: SLEEPER, useValue: timerSleeper },
  ],
  exports: [HARVEST_CONFIG, CLOCK, SLEEPER],
})
export class HarvestConfigModule {}
