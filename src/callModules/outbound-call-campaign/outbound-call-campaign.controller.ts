// src/callModules/outbound-call-campaign/outbound-call-campaign.controller.ts
import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, ParseUUIDPipe, Post, Query } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiParam, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';

import { ZodValidationPipe } from '../../common/pipes/zod.validation.pipe';
import type { CampaignResult, ProgressSnapshot } from '../dispatcher/interface/campaign-dispatch.interface';
import {
  CreateOutboundCallCampaignDto,
  CreateOutboundCallCampaignSchema,
} from './dto/create-outbound-call-campaign.dto';
import {
  QueryOutboundCallCampaignsDto,
  QueryOutboundCallCampaignsSchema,
} from './dto/query-outbound-call-campaigns.dto';
import {
  ScheduleOutboundCallCampaignDto,
  ScheduleOutboundCallCampaignSchema,
} from './dto/schedule-outbound-call-campaign.dto';
import { SendVoicemailDto, SendVoicemailSchema } from './dto/send-voicemail.dto';
import type { IOutboundCallCampaignAnalytics } from './interface/outbound-call-campaign-analytics.interface';
import type { IOutboundCallCampaign } from './interface/outbound-call-campaign.interface';
import type { IOutboundCallCampaignOverview } from './interface/outbound-call-campaign-overview.interface';
import type { IPaginated } from './interface/outbound-call-campaign-query.interface';
import type { IVoicemailCall } from './interface/voicemail-call.interface';
import { OutboundCallCampaignService } from './outbound-call-campaign.service';

@ApiTags('outbound-call-campaigns')
@Controller('outbound-call-campaigns')
export class OutboundCallCampaignController {
  constructor(private readonly svc: OutboundCallCampaignService) {}

  // ------------------------------ Create ------------------------------
  @Post()
  @ApiOperation({ summary: 'Create a campaign from a parsed contact list' })
  @ApiResponse({ status: 201, description: 'Campaign created (DRAFT, or SCHEDULED when scheduledAt is given).' })
  @ApiResponse({ status: 400, description: 'Validation failed.' })
  async create(
    @Body(new ZodValidationPipe(CreateOutboundCallCampaignSchema)) dto: CreateOutboundCallCampaignDto,
  ): Promise<IOutboundCallCampaign> {
    return this.svc.create(dto);
  }

  // ------------------------------ List / Read ------------------------------
  @Get()
  @ApiOperation({ summary: 'List campaigns' })
  @ApiQuery({ name: 'page', required: false, example: '1' })
  @ApiQuery({ name: 'limit', required: false, example: '20' })
  @ApiQuery({ name: 'status', required: false, description: 'One or more of DRAFT, SCHEDULED, RUNNING, COMPLETED, CANCELLED, ABORTED' })
  @ApiQuery({ name: 'clientReference', required: false })
  @ApiQuery({ name: 'q', required: false, description: 'Name contains (case-insensitive)' })
  @ApiQuery({ name: 'sortBy', required: false, enum: ['createdAt', 'scheduledAt', 'name', 'status'] })
  @ApiQuery({ name: 'sortOrder', required: false, enum: ['asc', 'desc'] })
  async findMany(
    @Query(new ZodValidationPipe(QueryOutboundCallCampaignsSchema)) q: QueryOutboundCallCampaignsDto,
  ): Promise<IPaginated<IOutboundCallCampaign>> {
    return this.svc.findMany(q);
  }

  // declared before ':id' so the UUID pipe never sees it
  @Get('overview')
  @ApiOperation({ summary: 'Dashboard totals across all campaigns' })
  async overview(): Promise<IOutboundCallCampaignOverview> {
    return this.svc.overview();
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a campaign' })
  @ApiParam({ name: 'id', format: 'uuid' })
  @ApiResponse({ status: 404, description: 'Campaign not found.' })
  async findOne(@Param('id', new ParseUUIDPipe()) id: string): Promise<IOutboundCallCampaign> {
    return this.svc.findOne(id);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a campaign with its contacts and results' })
  @ApiParam({ name: 'id', format: 'uuid' })
  @ApiResponse({ status: 409, description: 'Calls are still in progress.' })
  async remove(@Param('id', new ParseUUIDPipe()) id: string): Promise<void> {
    await this.svc.remove(id);
  }

  // ------------------------------ Actions ------------------------------
  @Post(':id/schedule')
  @ApiOperation({ summary: 'Schedule a start time (startAt ISO date, or startIn like "5m")' })
  @ApiParam({ name: 'id', format: 'uuid' })
  async schedule(
    @Param('id', new ParseUUIDPipe()) id: string,
    @Body(new ZodValidationPipe(ScheduleOutboundCallCampaignSchema)) dto: ScheduleOutboundCallCampaignDto,
  ): Promise<IOutboundCallCampaign> {
    return this.svc.schedule(id, dto);
  }

  @Post(':id/start')
  @HttpCode(HttpStatus.ACCEPTED) // the run continues in the background
  @ApiOperation({ summary: 'Start dialing now' })
  @ApiParam({ name: 'id', format: 'uuid' })
  @ApiResponse({ status: 409, description: 'Campaign is already running.' })
  async start(@Param('id', new ParseUUIDPipe()) id: string): Promise<IOutboundCallCampaign> {
    return this.svc.start(id);
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Cancel a scheduled or running campaign; calls in progress finish' })
  @ApiParam({ name: 'id', format: 'uuid' })
  async cancel(@Param('id', new ParseUUIDPipe()) id: string): Promise<IOutboundCallCampaign> {
    return this.svc.cancel(id);
  }

  @Post('voicemail')
  @ApiOperation({ summary: 'Place a single reminder call that leaves the message as voicemail' })
  @ApiResponse({ status: 201, description: 'Call placed.' })
  @ApiResponse({ status: 400, description: 'Invalid phone number or body.' })
  @ApiResponse({ status: 502, description: 'Provider rejected the credentials.' })
  async sendVoicemail(
    @Body(new ZodValidationPipe(SendVoicemailSchema)) dto: SendVoicemailDto,
  ): Promise<IVoicemailCall> {
    return this.svc.sendVoicemail(dto);
  }

  // ------------------------------ Reporting ------------------------------
  @Get(':id/progress')
  @ApiOperation({ summary: 'Live (or final) progress counters' })
  @ApiParam({ name: 'id', format: 'uuid' })
  @ApiOkResponse({
    schema: {
      type: 'object',
      properties: {
        total: { type: 'number' },
        queued: { type: 'number' },
        inFlight: { type: 'number' },
        succeeded: { type: 'number' },
        failed: { type: 'number' },
        cancelled: { type: 'number' },
      },
    },
  })
  async progress(@Param('id', new ParseUUIDPipe()) id: string): Promise<ProgressSnapshot> {
    return this.svc.progress(id);
  }

  @Get(':id/results')
  @ApiOperation({ summary: 'Per-contact results in completion order' })
  @ApiParam({ name: 'id', format: 'uuid' })
  async results(@Param('id', new ParseUUIDPipe()) id: string): Promise<CampaignResult[]> {
    return this.svc.results(id);
  }

  @Get(':id/analytics')
  @ApiOperation({ summary: 'Totals, call duration and confirmation rate' })
  @ApiParam({ name: 'id', format: 'uuid' })
  async analytics(@Param('id', new ParseUUIDPipe()) id: string): Promise<IOutboundCallCampaignAnalytics> {
    return this.svc.analytics(id);
  }
}
