import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post, Query } from '@nestjs/common';
import { Recipient } from '../recipients/recipient.model';
import { CampaignStats } from '../stats/stats.projector';
import { StatsService } from '../stats/stats.service';
import { ActivationResult, Campaign, CampaignListItem, RescheduleResult } from './campaign.model';
import { CampaignsService } from './campaigns.service';

@Controller('campaigns')
export class CampaignsController {
  constructor(
    private readonly campaignsService: CampaignsService,
    private readonly statsService: StatsService
  ) {}

  @Post()
  create(@Body() body: unknown): Promise<Campaign> {
    return this.campaignsService.create(body);
  }

  @Get()
  list(@Query() query: unknown): Promise<CampaignListItem[]> {
    return this.campaignsService.list(query);
  }

  @Get(':campaignId')
  get(@Param('campaignId') campaignId: string): Promise<Campaign> {
    return this.campaignsService.getOrThrow(campaignId);
  }

  @Post(':campaignId/activate')
  @HttpCode(HttpStatus.OK)
  activate(@Param('campaignId') campaignId: string, @Body() body: unknown): Promise<ActivationResult> {
    return this.campaignsService.activate(campaignId, body);
  }

  @Post(':campaignId/pause')
  @HttpCode(HttpStatus.OK)
  pause(@Param('campaignId') campaignId: string): Promise<Campaign> {
    return this.campaignsService.pause(campaignId);
  }

  @Post(':campaignId/resume')
  @HttpCode(HttpStatus.OK)
  resume(@Param('campaignId') campaignId: string): Promise<Campaign> {
    return this.campaignsService.resume(campaignId);
  }

  @Post(':campaignId/cancel')
  @HttpCode(HttpStatus.OK)
  cancel(@Param('campaignId') campaignId: string): Promise<Campaign> {
    return this.campaignsService.cancel(campaignId);
  }

  @Post(':campaignId/reschedule-today')
  @HttpCode(HttpStatus.OK)
  rescheduleToday(@Param('campaignId') campaignId: string): Promise<RescheduleResult> {
    return this.campaignsService.rescheduleToday(campaignId);
  }

  @Get(':campaignId/stats')
  stats(@Param('campaignId') campaignId: string): Promise<CampaignStats> {
    return this.statsService.forCampaign(campaignId);
  }

  @Get(':campaignId/recipients')
  recipients(@Param('campaignId') campaignId: string, @Query() query: unknown): Promise<Recipient[]> {
    return this.campaignsService.listRecipients(campaignId, query);
  }
}
