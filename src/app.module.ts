import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { HarvestConfigModule } from './config/harvest-config.module';
import { BilibiliModule } from './integrations/bilibili/bilibili.module';
import { DatasetModule } from './dataset/dataset.module';
import { HarvestModule } from './harvest/harvest.module';
import { ExportModule } from './export/export.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    HarvestConfigModule,
    BilibiliModule,

    DatasetModule,
    HarvestModule,
    ExportModule,
  ],
})
export class AppModule {}
