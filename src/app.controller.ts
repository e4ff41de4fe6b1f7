import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

@Controller()
export class AppController {
  constructor(private readonly configService: ConfigService) {}

  @Get()
  getRoot(): { message: string } {
    return {
      message: this.configService.get<string>('PROJECT_NAME', 'Ko-fi API'),
    };
  }
}
