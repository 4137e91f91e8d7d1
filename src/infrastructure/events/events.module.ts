import { Global, Module } from '@nestjs/common';
import { ContentEventBus } from './content-event-bus';

@Global()
@Module({
  providers: [ContentEventBus],
  exports: [ContentEventBus],
})
export class EventsModule {}
