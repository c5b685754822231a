import {
  Body,
  Controller,
  Get,
  Headers,
  HttpCode,
  HttpStatus,
  Post,
  Query,
  Req,
  UnauthorizedException
} from '@nestjs/common';
import { ReconcileSummary } from '../reconciler/status-reconciler.service';
import { WebhooksService } from './webhooks.service';

type RawBodyRequest = { rawBody?: Buffer };

@Controller('webhooks')
export class WebhooksController {
  constructor(private readonly webhooksService: WebhooksService) {}

  @Get('whatsapp')
  verify(
    @Query('hub.mode') mode: string,
    @Query('hub.verify_token') verifyToken: string,
    @Query('hub.challenge') challenge: string
  ): string {
    if (this.webhooksService.verifyToken(mode, verifyToken)) {
      return challenge;
    }

    throw new UnauthorizedException('Invalid verify token');
  }

  @Post('whatsapp')
  @HttpCode(HttpStatus.OK)
  async receive(
    @Req() req: RawBodyRequest,
    @Body() body: unknown,
    @Headers('x-hub-signature-256') signature?: string
  ): Promise<{ received: true } & ReconcileSummary> {
    this.assertSigned(req, body, signature);
    const summary = await this.webhooksService.ingestMeta(body);
    return { received: true, ...summary };
  }

  @Post('status-events')
  @HttpCode(HttpStatus.OK)
  async receiveNormalized(
    @Req() req: RawBodyRequest,
    @Body() body: unknown,
    @Headers('x-hub-signature-256') signature?: string
  ): Promise<{ received: true } & ReconcileSummary> {
    this.assertSigned(req, body, signature);
    const summary = await this.webhooksService.ingestNormalized(body);
    return { received: true, ...summary };
  }

  private assertSigned(req: RawBodyRequest, body: unknown, signature?: string): void {
    const rawBody = req.rawBody ?? Buffer.from(JSON.stringify(body));
    if (!this.webhooksService.verifySignature(rawBody, signature)) {
      throw new UnauthorizedException('Invalid webhook signature');
    }
  }
}
