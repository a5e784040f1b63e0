import {
  BadGatewayException,
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  Logger,
  Post,
  Query,
  UseInterceptors,
  ValidationPipe,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import {
  IncomingStatus,
  MentionDirection,
  ResolutionFailure,
  ValidationError,
  WebmentionRecord,
  WebmentionsHandler,
} from '../../../core';
import {
  ApiListWebmentions,
  ApiReceiveWebmention,
  ListWebmentionsDto,
  WebmentionRequestDto,
  WebmentionResponseDto,
} from '../../../_shared';
import { WEBMENTIONS_HANDLER } from '../constants';
import { WebmentionLinkInterceptor } from '../interceptors/webmention-link.interceptor';

const STATUS_MESSAGES: Record<IncomingStatus, string> = {
  accepted: 'Webmention accepted',
  deleted: 'Webmention deleted: the source no longer links to the target',
  unchanged: 'Webmention already up to date',
};

/**
 * Webmention Controller
 *
 * The receiving endpoint. Remote sites POST `source` and `target` to it.
 */
@ApiTags('Webmentions')
@Controller('webmentions')
@UseInterceptors(WebmentionLinkInterceptor)
export class WebmentionController {
  private readonly logger = new Logger(WebmentionController.name);

  constructor(
    @Inject(WEBMENTIONS_HANDLER)
    private readonly handler: WebmentionsHandler,
  ) {}

  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiReceiveWebmention()
  async receive(
    @Body(new ValidationPipe({ transform: true, whitelist: true }))
    body: WebmentionRequestDto,
  ): Promise<WebmentionResponseDto> {
    this.logger.log(`Received webmention ${body.source} -> ${body.target}`);

    try {
      const result = await this.handler.processIncoming(
        body.source,
        body.target,
      );
      return {
        status: result.status,
        source: result.mention.source,
        target: result.mention.target,
        message: STATUS_MESSAGES[result.status],
      };
    } catch (error) {
      if (error instanceof ValidationError) {
        this.logger.warn(`Rejected webmention: ${error.message}`);
        throw new BadRequestException(error.message);
      }
      if (error instanceof ResolutionFailure) {
        this.logger.warn(`Could not fetch source: ${error.message}`);
        throw new BadGatewayException(error.message);
      }
      throw error;
    }
  }

  @Get()
  @ApiListWebmentions()
  async list(
    @Query(new ValidationPipe({ transform: true, whitelist: true }))
    query: ListWebmentionsDto,
  ): Promise<WebmentionRecord[]> {
    const mentions = await this.handler.retrieveWebmentions(
      query.resource,
      query.direction ?? MentionDirection.IN,
    );
    return mentions.map((mention) => mention.toPlainObject());
  }
}
