import { Module } from '@nestjs/common';
import { DatasetModule } from '@/dataset/dataset.module';
import { ExportService } from './export.service';

@Module({
  imports: [DatasetModule],
  providers: [ExportService],
  exports: [ExportService],
})
export class ExportModule {}
