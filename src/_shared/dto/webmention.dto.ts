import { IsEnum, IsNotEmpty, IsOptional, IsString, IsUrl } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { MentionDirection } from '../../core/domain/enums';
import type { IncomingStatus } from '../../core/processors/types';

const URL_OPTIONS = {
  require_protocol: true,
  require_tld: false,
  protocols: ['http', 'https'],
};

/**
 * Body of a Webmention notification (form-encoded or JSON)
 */
export class WebmentionRequestDto {
  @ApiProperty({
    description: 'URL of the document that mentions the target',
    example: 'https://alice.example/posts/reply-1',
  })
  @IsString()
  @IsNotEmpty()
  @IsUrl(URL_OPTIONS)
  source!: string;

  @ApiProperty({
    description: 'URL of the local resource being mentioned',
    example: 'https://blog.example/articles/hello',
  })
  @IsString()
  @IsNotEmpty()
  @IsUrl(URL_OPTIONS)
  target!: string;
}

/**
 * Response DTO for a received notification
 */
export class WebmentionResponseDto {
  @ApiProperty({
    description: 'What happened to the mention',
    enum: ['accepted', 'deleted', 'unchanged'],
    example: 'accepted',
  })
  status!: IncomingStatus;

  @ApiProperty({ example: 'https://alice.example/posts/reply-1' })
  source!: string;

  @ApiProperty({ example: 'https://blog.example/articles/hello' })
  target!: string;

  @ApiProperty({ example: 'Webmention accepted' })
  message!: string;
}

/**
 * Query for listing the confirmed mentions of a resource
 */
export class ListWebmentionsDto {
  @ApiProperty({
    description: 'Target URL for incoming mentions, source URL for outgoing ones',
    example: 'https://blog.example/articles/hello',
  })
  @IsString()
  @IsUrl(URL_OPTIONS)
  resource!: string;

  @ApiPropertyOptional({
    description: 'Mention direction',
    enum: MentionDirection,
    default: MentionDirection.IN,
  })
  @IsOptional()
  @IsEnum(MentionDirection)
  direction?: MentionDirection = MentionDirection.IN;
}

/**
 * A stored mention as returned by the API
 */
export class WebmentionRecordDto {
  @ApiProperty() source!: string;
  @ApiProperty() target!: string;
  @ApiProperty({ enum: MentionDirection }) direction!: string;
  @ApiProperty({ example: 'confirmed' }) status!: string;
  @ApiProperty({ example: 'reply' }) mentionType!: string;
  @ApiPropertyOptional({ nullable: true, example: 'yes' }) rsvp!: string | null;
  @ApiPropertyOptional({ nullable: true }) title!: string | null;
  @ApiPropertyOptional({ nullable: true }) excerpt!: string | null;
  @ApiPropertyOptional({ nullable: true }) content!: string | null;
  @ApiPropertyOptional({ nullable: true }) authorName!: string | null;
  @ApiPropertyOptional({ nullable: true }) authorUrl!: string | null;
  @ApiPropertyOptional({ nullable: true }) authorPhoto!: string | null;
  @ApiPropertyOptional({ nullable: true, format: 'date-time' }) published!: string | null;
  @ApiProperty({ type: 'object', additionalProperties: true }) metadata!: Record<string, unknown>;
  @ApiPropertyOptional({ nullable: true, format: 'date-time' }) createdAt!: string | null;
  @ApiPropertyOptional({ nullable: true, format: 'date-time' }) updatedAt!: string | null;
}
