import { Controller, Get, Param, NotFoundException } from '@nestjs/common';
import { AnalysisJobResponseDto, HistoryListResponseDto } from '../dto';
import { OwnerIdentity, requireOwner } from '../decorators';
import { JobNotFoundError } from '../../../domain';
import { GetAnalysisStatusQuery } from '../../../application';

@Controller('history')
export class HistoryController {
  constructor(private readonly statusQuery: GetAnalysisStatusQuery) {}

  @Get()
  async list(@OwnerIdentity() ownerIdentity: string | null): Promise<HistoryListResponseDto> {
    return this.statusQuery.listHistory(requireOwner(ownerIdentity));
  }

  @Get(':id')
  async findOne(
    @Param('id') id: string,
    @OwnerIdentity() ownerIdentity: string | null,
  ): Promise<AnalysisJobResponseDto> {
    const owner = requireOwner(ownerIdentity);
    try {
      return await this.statusQuery.getHistoryItem(owner, id);
    } catch (error) {
      if (error instanceof JobNotFoundError) {
        throw new NotFoundException(error.message);
      }
      throw error;
    }
  }
}
