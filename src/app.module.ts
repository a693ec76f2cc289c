import { Module } from '@nestjs/common';
import { ApiModule } from './api/api.module';
import { EngineModule } from './engine.module';

@Module({
  imports: [EngineModule, ApiModule],
})
export class AppModule {}
