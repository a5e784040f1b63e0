import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse } from '@nestjs/swagger';

const COUNTS_BY_STATUS = {
  type: 'object',
  properties: {
    pending: { type: 'number' },
    confirmed: { type: 'number' },
    deleted: { type: 'number' },
  },
};

const CALLBACK_COUNTS = {
  type: 'object',
  properties: {
    calls: { type: 'number' },
    successes: { type: 'number' },
    failures: { type: 'number' },
  },
};

/**
 * Swagger decorator for the readiness check
 */
export const ApiHealthCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Readiness check',
      description: 'Reports whether the Webmention store is reachable',
    }),
    ApiResponse({
      status: 200,
      description: 'Service readiness status',
      schema: {
        type: 'object',
        properties: {
          status: {
            type: 'string',
            enum: ['ready', 'not_ready'],
            example: 'ready',
          },
          timestamp: { type: 'string', format: 'date-time' },
          checks: {
            type: 'object',
            properties: {
              storage: { type: 'boolean', example: true },
            },
          },
        },
      },
    }),
  );
};

/**
 * Swagger decorator for service statistics
 */
export const ApiServiceStatistics = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Get service statistics',
      description:
        'Stored mention counts by status and direction, and callback outcomes since startup',
    }),
    ApiResponse({
      status: 200,
      description: 'Service statistics',
      schema: {
        type: 'object',
        properties: {
          storage: {
            type: 'object',
            properties: {
              total: { type: 'number' },
              byStatus: COUNTS_BY_STATUS,
              byDirection: {
                type: 'object',
                properties: {
                  incoming: { type: 'number' },
                  outgoing: { type: 'number' },
                },
              },
            },
          },
          callbacks: {
            type: 'object',
            properties: {
              onMentionProcessed: CALLBACK_COUNTS,
              onMentionDeleted: CALLBACK_COUNTS,
            },
          },
          uptime: { type: 'number', description: 'Uptime in seconds' },
        },
      },
    }),
  );
};
