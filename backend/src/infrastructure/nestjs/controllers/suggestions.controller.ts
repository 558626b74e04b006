import { Body, Controller, Get, HttpCode, HttpStatus, Inject, Param, Post } from '@nestjs/common';
import { RespondToSuggestionDto, SuggestionResponseDto } from '../dto';
import { IJobRepository, ISuggestionRepository, JOB_REPOSITORY, SUGGESTION_REPOSITORY } from '../../../domain';
import {
  RespondToSuggestionCommand,
  SuggestionResponseKind,
} from '../../../application/commands/RespondToSuggestion';
import { ListSuggestionsQuery } from '../../../application/queries/ListSuggestions';
import { toSuggestionDto } from '../../../application/mappers';
import { toHttpException } from './http-errors';

@Controller('suggestions')
export class SuggestionsController {
  constructor(
    @Inject(JOB_REPOSITORY)
    private readonly jobRepo: IJobRepository,
    @Inject(SUGGESTION_REPOSITORY)
    private readonly suggestionRepo: ISuggestionRepository,
  ) {}

  @Get(':id')
  async findOne(@Param('id') id: string): Promise<SuggestionResponseDto> {
    try {
      return await new ListSuggestionsQuery(this.jobRepo, this.suggestionRepo).getById(id);
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Post(':id/accept')
  @HttpCode(HttpStatus.OK)
  accept(@Param('id') id: string, @Body() dto: RespondToSuggestionDto): Promise<SuggestionResponseDto> {
    return this.respond(id, 'accept', dto);
  }

  @Post(':id/reject')
  @HttpCode(HttpStatus.OK)
  reject(@Param('id') id: string, @Body() dto: RespondToSuggestionDto): Promise<SuggestionResponseDto> {
    return this.respond(id, 'reject', dto);
  }

  @Post(':id/ignore')
  @HttpCode(HttpStatus.OK)
  ignore(@Param('id') id: string, @Body() dto: RespondToSuggestionDto): Promise<SuggestionResponseDto> {
    return this.respond(id, 'ignore', dto);
  }

  private async respond(
    suggestionId: string,
    response: SuggestionResponseKind,
    dto: RespondToSuggestionDto,
  ): Promise<SuggestionResponseDto> {
    const command = new RespondToSuggestionCommand(this.suggestionRepo);
    try {
      const suggestion = await command.execute({ suggestionId, response, feedback: dto.feedback });
      return toSuggestionDto(suggestion);
    } catch (error) {
      throw toHttpException(error);
    }
  }
}
