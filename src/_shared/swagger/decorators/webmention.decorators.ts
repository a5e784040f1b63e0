import { applyDecorators } from '@nestjs/common';
import { ApiBody, ApiConsumes, ApiOperation, ApiResponse } from '@nestjs/swagger';
import {
  WebmentionRecordDto,
  WebmentionRequestDto,
  WebmentionResponseDto,
} from '../../dto/webmention.dto';

/**
 * Swagger decorator for the Webmention receiving endpoint
 */
export const ApiReceiveWebmention = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Receive a Webmention',
      description:
        'Verifies that the source links to the target, extracts its microformats and stores the mention. A source that no longer links to the target deletes the stored mention.',
    }),
    ApiConsumes('application/x-www-form-urlencoded', 'application/json'),
    ApiBody({ type: WebmentionRequestDto }),
    ApiResponse({
      status: 202,
      description: 'Mention accepted, deleted or unchanged',
      type: WebmentionResponseDto,
    }),
    ApiResponse({
      status: 400,
      description:
        'Invalid URLs, self-mention, foreign target, or a source that does not link to the target',
    }),
    ApiResponse({
      status: 502,
      description: 'The source could not be fetched; retry later',
    }),
  );
};

/**
 * Swagger decorator for listing confirmed mentions
 */
export const ApiListWebmentions = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'List confirmed mentions of a resource',
      description:
        'Incoming mentions are matched by target, outgoing ones by source. Pending and deleted mentions are never listed.',
    }),
    ApiResponse({
      status: 200,
      description: 'Confirmed mentions, newest first',
      type: WebmentionRecordDto,
      isArray: true,
    }),
  );
};
