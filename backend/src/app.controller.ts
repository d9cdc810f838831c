import { Controller, Get } from '@nestjs/common';

export const SERVICE_NAME = 'personal-assistant';

@Controller()
export class AppController {
  @Get('health')
  health() {
    return { status: 'ok', service: SERVICE_NAME };
  }
}
