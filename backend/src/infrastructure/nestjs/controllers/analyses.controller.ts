import {
  Controller,
  Get,
  Post,
  Param,
  Body,
  HttpCode,
  HttpStatus,
  NotFoundException,
  BadRequestException,
} from '@nestjs/common';
import { SubmitAnalysisDto, SubmitAnalysisResponse, AnalysisJobResponseDto } from '../dto';
import { OwnerIdentity } from '../decorators';
import { JobNotFoundError, ValidationError } from '../../../domain';
import { SubmitAnalysisCommand, GetAnalysisStatusQuery } from '../../../application';

@Controller('analyses')
export class AnalysesController {
  constructor(
    private readonly submitAnalysis: SubmitAnalysisCommand,
    private readonly statusQuery: GetAnalysisStatusQuery,
  ) {}

  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  async submit(
    @Body() dto: SubmitAnalysisDto,
    @OwnerIdentity() ownerIdentity: string | null,
  ): Promise<SubmitAnalysisResponse> {
    try {
      return await this.submitAnalysis.execute({
        repositoryReference: dto.repositoryReference,
        parameters: dto.parameters,
        ownerIdentity,
      });
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  }

  @Get(':id')
  async findOne(
    @Param('id') id: string,
    @OwnerIdentity() ownerIdentity: string | null,
  ): Promise<AnalysisJobResponseDto> {
    try {
      return await this.statusQuery.getById(id, ownerIdentity);
    } catch (error) {
      if (error instanceof JobNotFoundError) {
        throw new NotFoundException(error.message);
      }
      throw error;
    }
  }
}
