import { IsIn, IsOptional, IsString, MaxLength } from 'class-validator';
import { CONTENT_EVENTS, ContentEventName } from '../../../infrastructure/events/content-events';

export class PublishContentEventDto {
  @IsIn(CONTENT_EVENTS, {
    message: `event must be one of: ${CONTENT_EVENTS.join(', ')}`,
  })
  event!: ContentEventName;

  @IsOptional()
  @IsString()
  @MaxLength(128)
  contentId?: string;
}
