import { Controller, Get } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { AppConfigService } from '../config/config.service';
import { TaskRegistry } from '../tasks/task-registry.service';

@ApiTags('health')
@Controller('health')
export class HealthController {
  constructor(
    private readonly registry: TaskRegistry,
    private readonly configService: AppConfigService,
  ) {}

  @Get()
  check() {
    return {
      status: 'ok',
      environment: this.configService.get('environment'),
      tasks: this.registry.list().length,
      timestamp: new Date().toISOString(),
    };
  }
}
