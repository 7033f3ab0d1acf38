import { Controller, Get } from '@nestjs/common';
import { Public } from './auth/basic-auth.guard.js';

@Controller()
export class AppController {
  /** Liveness probe for Cloud Run */
  @Public()
  @Get('health')
  health(): { status: 'ok' } {
    return { status: 'ok' };
  }
}
