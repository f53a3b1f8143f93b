import { Controller, Get, Header } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { SkipThrottle } from '@nestjs/throttler';

@ApiTags('health')
@Controller()
export class HealthController {
  @Get('ping')
  @SkipThrottle()
  @Header('Content-Type', 'text/plain')
  @ApiOperation({
    summary: 'Heartbeat',
    description: 'Liveness probe for load balancers; does not touch storage'
  })
  @ApiResponse({ status: 200, description: 'Server is up', content: { 'text/plain': { example: '.' } } })
  ping(): string {
    return '.';
  }
}
