import { Controller, Get, Res } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { Response } from 'express';
import { SystemService } from './system.service';

@ApiTags('System')
@Controller('system')
export class SystemController {
  constructor(private readonly systemService: SystemService) {}

  @Get('health')
  async health(@Res({ passthrough: true }) res: Response) {
    const health = await this.systemService.checkHealth();
    if (health.status === 'DOWN') res.status(503);
    return health;
  }
}
