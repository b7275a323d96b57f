import { Controller, Get } from '@nestjs/common';
import { HealthResponseDto } from '../dto';
import { GetPipelineHealthQuery } from '../../../application';

@Controller('health')
export class HealthController {
  constructor(private readonly healthQuery: GetPipelineHealthQuery) {}

  @Get()
  async check(): Promise<HealthResponseDto> {
    return this.healthQuery.execute();
  }
}
