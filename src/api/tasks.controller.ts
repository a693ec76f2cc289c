import {
  BadRequestException,
  Body,
  ConflictException,
  Controller,
  Delete,
  Get,
  HttpCode,
  NotFoundException,
  Param,
  Post,
} from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { StartTaskDto } from '../common/dto/task-options.dto';
import { AppConfigService } from '../config/config.service';
import { isExchangeId } from '../exchanges/exchange.interface';
import { MonitoringTaskService } from '../tasks/monitoring-task.service';
import { TaskRegistry } from '../tasks/task-registry.service';
import { buildTaskSpec } from '../tasks/task-spec';
import { InvalidTaskSpecError, TaskAlreadyRunningError } from '../tasks/task.errors';
import { TaskInfo } from '../tasks/task.interface';

@ApiTags('tasks')
@Controller('tasks')
export class TasksController {
  constructor(
    private readonly registry: TaskRegistry,
    private readonly monitoringTasks: MonitoringTaskService,
    private readonly configService: AppConfigService,
  ) {}

  @Get()
  @ApiOperation({ summary: 'List running monitoring tasks' })
  list(): TaskInfo[] {
    return this.registry.list();
  }

  @Post()
  @ApiOperation({ summary: 'Start a monitoring task for one exchange and symbol' })
  start(@Body() body: StartTaskDto): TaskInfo {
    try {
      return this.monitoringTasks.start(buildTaskSpec(body.exchange, body, this.configService)).info;
    } catch (error) {
      if (error instanceof TaskAlreadyRunningError) {
        throw new ConflictException(error.message);
      }
      if (error instanceof InvalidTaskSpecError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  }

  @Delete(':exchange/:symbol')
  @HttpCode(202)
  @ApiOperation({ summary: 'Stop a task; outstanding orders are cancelled' })
  stop(@Param('exchange') exchange: string, @Param('symbol') symbol: string): { stopping: string } {
    if (!isExchangeId(exchange) || !this.registry.stop(exchange, symbol)) {
      throw new NotFoundException(`No task running for ${exchange}:${symbol}`);
    }
    return { stopping: `${exchange}:${symbol}` };
  }
}
