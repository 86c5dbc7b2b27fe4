import { Controller, Get, Inject } from '@nestjs/common';
import { COMPLETION_CLIENT, type CompletionClient } from './modules/core/completion/completion-client.interface';

@Controller('health')
export class HealthController {
  constructor(@Inject(COMPLETION_CLIENT) private completion: CompletionClient) { }

  @Get()
  check() {
    return {
      status: 'ok',
      completion: this.completion.available ? 'available' : 'unavailable',
      model: this.completion.model,
    };
  }
}
