import 'reflect-metadata';
import { LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '@/app.module';
import { TrendingHarvester } from '@/harvest/trending.harvester';
import { NegativeHarvester } from '@/harvest/negative.harvester';
import { SnapshotBackfiller } from '@/harvest/snapshot.backfiller';
import { ExportService } from '@/export/export.service';
import { USAGE, parseCliArgs } from './cli.args';

(async () => {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(`${parsed.error}\n\n${USAGE}`);
    process.exit(2);
  }
  const command = parsed.command;
  if (command.mode === 'help') {
    console.log(USAGE);
    return;
  }

  const logger: LogLevel[] = ['log', 'warn', 'error'];
  if (command.verbose) logger.push('debug');

  const app = await NestFactory.createApplicationContext(AppModule, { logger });

  try {
    switch (command.mode) {
      case 'trending': {
        const summary = await app.get(TrendingHarvester).run(command.options);
        console.log(JSON.stringify({ mode: command.mode, ...summary }));
        break;
      }
      case 'negatives': {
        const summary = await app.get(NegativeHarvester).run(command.options);
        console.log(JSON.stringify({ mode: command.mode, ...summary }));
        break;
      }
      case 'snapshots': {
        const summary = await app.get(SnapshotBackfiller).run(command.options);
        console.log(JSON.stringify({ mode: command.mode, ...summary }));
        break;
      }
      case 'export': {
        const summary = await app.get(ExportService).exportDays(command);
        console.log(JSON.stringify({ mode: command.mode, ...summary }));
        break;
      }
    }
  } finally {
    await app.close();
  }
})().catch((err) => {
  console.error(
    'Fatal error in CLI:',
    err instanceof Error ? err.message : err,
  );
  process.exit(1);
});
