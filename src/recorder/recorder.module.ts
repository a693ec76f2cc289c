import { Module } from '@nestjs/common';
import { AppConfigService } from '../config/config.service';
import { PositionRecorder } from './position-recorder';
import { SqlitePositionRecorder } from './sqlite-position-recorder';

@Module({
  providers: [
    {
      provide: PositionRecorder,
      useFactory: (configService: AppConfigService) =>
        new SqlitePositionRecorder(configService.get('recorder').databasePath),
      inject: [AppConfigService],
    },
  ],
  exports: [PositionRecorder],
})
export class RecorderModule {}
