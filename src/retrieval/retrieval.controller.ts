/**
 * Retrieval HTTP Controller
 */

import { Body, Controller, Logger, Post, ValidationPipe } from '@nestjs/common';
import { QueryRequestDto } from './dto/query-request.dto';
import { toAnswerResponse, type AnswerResponseDto } from './dto/answer-response.dto';
import { toHttpException } from './retrieval-http-error';
import { RetrievalService } from './retrieval.service';

@Controller('query')
export class RetrievalController {
  private readonly logger = new Logger(RetrievalController.name);

  constructor(private readonly retrievalService: RetrievalService) {}

  /**
   * POST /query
   *
   * Request:
   * {
   *   "query": "What is the front axle oil capacity of the 943?",
   *   "limit": 10,            // optional, results per sub-question
   *   "scoreThreshold": 0.2   // optional
   * }
   *
   * Response:
   * {
   *   "answer": "...",
   *   "references": { "tables": [...], "figures": [...] }
   * }
   */
  @Post()
  async query(
    @Body(new ValidationPipe({ whitelist: true })) body: QueryRequestDto,
  ): Promise<AnswerResponseDto> {
    this.logger.log(`Query request: "${body.query}"`);

    try {
      const result = await this.retrievalService.answer(body.query, {
        limit: body.limit,
        prefetchLimit: body.prefetchLimit,
        scoreThreshold: body.scoreThreshold,
      });
      return toAnswerResponse(result);
    } catch (error) {
      throw toHttpException(error);
    }
  }
}
