// src/callModules/outbound-call-campaign/outbound-call-campaign.service.ts
import {
  BadRequestException,
  ConflictException,
  HttpException,
  Inject,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException,
  OnModuleDestroy,
} from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';

import { CampaignAbortedError, ScriptConfigError } from '../../common/errors/call-errors';
import { RecordNotFoundError } from '../../common/errors/store-errors';
import { parseHumanDuration } from '../../common/utils/human-duration';
import { APP_CONFIG, AppConfig } from '../../config/app-config';
import { CALL_CLIENT, CallClient } from '../call-client/interface/call-client.interface';
import { parseScriptConfig } from '../call-client/schema/script-config.schema';
import { CampaignDispatcher } from '../dispatcher/campaign-dispatcher';
import {
  CampaignResult,
  CampaignRun,
  Contact,
  FinalStatus,
  ProgressSnapshot,
  RESULT_STORE,
  ResultStore,
} from '../dispatcher/interface/campaign-dispatch.interface';
import { ResultAggregator } from '../dispatcher/result-aggregator';
import { PhoneNumberNormalizer } from '../phone-number/phone-number.normalizer';
import { DispatchRateLimits } from '../rate-limiter/dispatch-rate-limits';
import type { TranscriptSummary } from '../transcript/transcript-classifier';
import { CreateOutboundCallCampaignDto } from './dto/create-outbound-call-campaign.dto';
import { QueryOutboundCallCampaignsDto } from './dto/query-outbound-call-campaigns.dto';
import { ScheduleOutboundCallCampaignDto } from './dto/schedule-outbound-call-campaign.dto';
import { SendVoicemailDto } from './dto/send-voicemail.dto';
import {
  CAMPAIGN_STORE,
  CampaignStore,
  CONTACT_LIST_STORE,
  ContactListStore,
} from './interface/campaign-stores.interface';
import { IOutboundCallCampaignAnalytics } from './interface/outbound-call-campaign-analytics.interface';
import { IOutboundCallCampaign, OutboundCallCampaignStatus } from './interface/outbound-call-campaign.interface';
import { IOutboundCallCampaignOverview } from './interface/outbound-call-campaign-overview.interface';
import { IPaginated } from './interface/outbound-call-campaign-query.interface';
import { IVoicemailCall } from './interface/voicemail-call.interface';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const Status = OutboundCallCampaignStatus;

const ALLOWED: Record<OutboundCallCampaignStatus, OutboundCallCampaignStatus[]> = {
  [Status.DRAFT]: [Status.SCHEDULED, Status.RUNNING, Status.CANCELLED],
  [Status.SCHEDULED]: [Status.RUNNING, Status.CANCELLED],
  [Status.RUNNING]: [Status.COMPLETED, Status.CANCELLED, Status.ABORTED],
  [Status.COMPLETED]: [],
  [Status.CANCELLED]: [],
  [Status.ABORTED]: [],
};

const TERMINAL = new Set<OutboundCallCampaignStatus>([Status.COMPLETED, Status.CANCELLED, Status.ABORTED]);

interface ActiveRun {
  controller: AbortController;
  aggregator: ResultAggregator;
  /** Settles once the run is over and the campaign record reflects it. Never rejects. */
  done: Promise<void>;
}

const messageOf = (e: unknown) => (e instanceof Error ? e.message : String(e));

@Injectable()
export class OutboundCallCampaignService implements OnModuleDestroy {
  private readonly logger = new Logger(OutboundCallCampaignService.name);

  // re-entrancy guard for cron
  private tickRunning = false;

  private readonly starting = new Set<string>();
  private readonly activeRuns = new Map<string, ActiveRun>();

  constructor(
    @Inject(CAMPAIGN_STORE) private readonly repo: CampaignStore,
    @Inject(CONTACT_LIST_STORE) private readonly contactLists: ContactListStore,
    @Inject(RESULT_STORE) private readonly resultStore: ResultStore,
    private readonly dispatcher: CampaignDispatcher,
    private readonly rateLimits: DispatchRateLimits,
    private readonly normalizer: PhoneNumberNormalizer,
    @Inject(CALL_CLIENT) private readonly callClient: CallClient,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  // ---------------------------------------------------------------------------
  // CRON WORKER
  // ---------------------------------------------------------------------------
  /**
   * Starts SCHEDULED campaigns whose start time has passed. Runs every 30
   * seconds in CRON_TZ (decorator arguments are read when the class loads).
   */
  @Cron(CronExpression.EVERY_30_SECONDS, {
    name: 'outbound-call-campaigns',
    timeZone: process.env.CRON_TZ ?? 'UTC',
  })
  async handleScheduledCampaignsCron(): Promise<void> {
    if (this.config.cronDisabled) return;

    if (this.tickRunning) {
      this.logger.warn('[cron] previous tick still running, skipping this one');
      return;
    }
    this.tickRunning = true;
    const started = Date.now();

    try {
      const result = await this.runScheduledTick();
      this.logger.log(
        `[cron] tick done in ${Date.now() - started}ms; scanned=${result.scanned}; started=${result.started.length}`,
      );
    } catch (err) {
      this.logger.error(`[cron] tick error: ${messageOf(err)}`);
    } finally {
      this.tickRunning = false;
    }
  }

  async runScheduledTick(now = new Date()): Promise<{ scanned: number; started: string[] }> {
    const due = await this.repo.findDueScheduled(now);
    const started: string[] = [];

    for (const campaign of due) {
      try {
        await this.start(campaign.id);
        started.push(campaign.id);
      } catch (e) {
        this.logger.warn(`[cron] could not start campaign ${campaign.id}: ${messageOf(e)}`);
      }
    }
    return { scanned: due.length, started };
  }

  // ---------------------------------------------------------------------------
  // CRUD
  // ---------------------------------------------------------------------------

  async create(dto: CreateOutboundCallCampaignDto): Promise<IOutboundCallCampaign> {
    if (dto.scheduledAt) this.ensureFuture(dto.scheduledAt, 'scheduledAt');

    try {
      const campaign = await this.repo.create({
        name: dto.name,
        clientReference: dto.clientReference,
        status: dto.scheduledAt ? Status.SCHEDULED : Status.DRAFT,
        settings: dto.settings,
        contactsCount: dto.contacts.length,
        scheduledAt: dto.scheduledAt,
      });
      await this.contactLists.save(campaign.id, dto.contacts);
      this.logger.log(`[create] campaign ${campaign.id} with ${dto.contacts.length} contacts (${campaign.status})`);
      return campaign;
    } catch (e) {
      this.mapAndThrow(e, 'creating campaign', { name: dto.name });
    }
  }

  async findMany(q: QueryOutboundCallCampaignsDto): Promise<IPaginated<IOutboundCallCampaign>> {
    try {
      return await this.repo.findMany(q);
    } catch (e) {
      this.mapAndThrow(e, 'listing campaigns', { q });
    }
  }

  async findOne(id: string): Promise<IOutboundCallCampaign> {
    return this.ensureExists(id);
  }

  async remove(id: string): Promise<void> {
    const current = await this.ensureExists(id);
    if (current.status === Status.RUNNING || this.starting.has(id) || this.activeRuns.has(id)) {
      throw new ConflictException('Cannot delete a campaign while calls are in progress');
    }

    try {
      await this.repo.remove(id);
      await this.contactLists.remove(id);
      await this.resultStore.clear(id);
    } catch (e) {
      this.mapAndThrow(e, 'deleting campaign', { id });
    }
  }

  // ---------------------------------------------------------------------------
  // Actions
  // ---------------------------------------------------------------------------

  async schedule(id: string, dto: ScheduleOutboundCallCampaignDto): Promise<IOutboundCallCampaign> {
    const current = await this.ensureExists(id);

    if (TERMINAL.has(current.status) || current.status === Status.RUNNING) {
      throw new BadRequestException(`Cannot schedule a ${current.status.toLowerCase()} campaign`);
    }

    let startAt: Date;
    try {
      startAt = dto.startAt ?? new Date(Date.now() + parseHumanDuration(dto.startIn ?? ''));
    } catch (e) {
      this.mapAndThrow(e, 'scheduling campaign', { id, dto });
    }
    this.ensureFuture(startAt, dto.startAt ? 'startAt' : 'startIn');

    try {
      const updated = await this.repo.update(id, { status: Status.SCHEDULED, scheduledAt: startAt });
      this.logger.log(`[schedule] campaign ${id} starts at ${startAt.toISOString()}`);
      return updated;
    } catch (e) {
      this.mapAndThrow(e, 'scheduling campaign', { id, dto, currentStatus: current.status });
    }
  }

  /**
   * Moves the campaign to RUNNING and dispatches it in the background.
   * Returns as soon as the run has started.
   */
  async start(id: string): Promise<IOutboundCallCampaign> {
    if (this.starting.has(id) || this.activeRuns.has(id)) {
      throw new ConflictException('Campaign is already running');
    }
    this.starting.add(id);

    try {
      const current = await this.ensureExists(id);
      this.assertTransition(current.status, Status.RUNNING);

      const contacts = await this.contactLists.load(id);
      await this.resultStore.clear(id);

      const controller = new AbortController();
      const aggregator = new ResultAggregator(id, contacts.length, this.resultStore);
      const results = this.dispatcher.run(this.toRun(current, contacts), {
        signal: controller.signal,
        aggregator,
        rateLimiter: this.rateLimits.shared(),
      });

      const updated = await this.repo.update(id, { status: Status.RUNNING, startedAt: new Date() });
      const done = this.consume(id, results, aggregator, controller.signal).catch((err: unknown) => {
        this.logger.error(`[run] campaign ${id} bookkeeping failed: ${messageOf(err)}`);
      });
      this.activeRuns.set(id, { controller, aggregator, done });

      this.logger.log(`[start] campaign ${id} running with ${contacts.length} contacts`);
      return updated;
    } catch (e) {
      this.mapAndThrow(e, 'starting campaign', { id });
    } finally {
      this.starting.delete(id);
    }
  }

  /** Stops new calls. Calls already in progress finish and keep their results. */
  async cancel(id: string): Promise<IOutboundCallCampaign> {
    const current = await this.ensureExists(id);
    this.assertTransition(current.status, Status.CANCELLED);

    this.activeRuns.get(id)?.controller.abort();

    try {
      const updated = await this.repo.update(id, { status: Status.CANCELLED, cancelledAt: new Date() });
      this.logger.log(`[cancel] campaign ${id} cancelled (was ${current.status})`);
      return updated;
    } catch (e) {
      this.mapAndThrow(e, 'cancelling campaign', { id, currentStatus: current.status });
    }
  }

  /**
   * Places a single reminder call outside any campaign. Provider and phone
   * errors propagate as domain errors for the exception filter to map.
   */
  async sendVoicemail(dto: SendVoicemailDto): Promise<IVoicemailCall> {
    const phone = this.normalizer.normalize(dto.phone, dto.defaultCountry);
    const script = parseScriptConfig({
      task: dto.message,
      voicemailMessage: dto.message,
      maxDurationSeconds: dto.maxDurationSeconds,
      answeredByEnabled: true,
      ...(dto.voice !== undefined && { voice: dto.voice }),
    });

    try {
      const handle = await this.callClient.initiate(phone, script);
      this.logger.log(`[voicemail] call ${handle.callId} placed to ${phone.e164}`);
      return { callId: handle.callId, phone: phone.e164 };
    } catch (e) {
      this.logger.warn(`[voicemail] call to ${phone.e164} failed: ${messageOf(e)}`);
      throw e;
    }
  }

  // ---------------------------------------------------------------------------
  // Reporting
  // ---------------------------------------------------------------------------

  async progress(id: string): Promise<ProgressSnapshot> {
    const campaign = await this.ensureExists(id);
    const active = this.activeRuns.get(id);
    if (active) return active.aggregator.snapshot();

    const results = await this.resultStore.list(id);
    const count = (...statuses: FinalStatus[]) => results.filter((r) => statuses.includes(r.finalStatus)).length;
    return {
      total: campaign.contactsCount,
      queued: Math.max(0, campaign.contactsCount - results.length),
      inFlight: 0,
      succeeded: count('Succeeded'),
      failed: count('Failed', 'GaveUp'),
      cancelled: count('Cancelled'),
    };
  }

  async results(id: string): Promise<CampaignResult[]> {
    await this.ensureExists(id);
    const active = this.activeRuns.get(id);
    return active ? active.aggregator.results() : this.resultStore.list(id);
  }

  async analytics(id: string): Promise<IOutboundCallCampaignAnalytics> {
    const results = await this.results(id);

    const summaryCounts: Record<TranscriptSummary, number> = {
      confirmed: 0,
      cancelled: 0,
      rescheduled: 0,
      busy_voicemail: 0,
    };
    const finalStatusCounts: Record<FinalStatus, number> = { Succeeded: 0, Failed: 0, GaveUp: 0, Cancelled: 0 };
    let totalDurationSeconds = 0;

    for (const r of results) {
      finalStatusCounts[r.finalStatus] += 1;
      // contacts never reached count as busy/voicemail, so the buckets add up to totalCalls
      summaryCounts[r.summary ?? 'busy_voicemail'] += 1;
      totalDurationSeconds += r.durationSeconds ?? 0;
    }

    const totalCalls = results.length;
    return {
      campaignId: id,
      totalCalls,
      totalDurationSeconds,
      successRate: totalCalls ? Math.round((summaryCounts.confirmed / totalCalls) * 1000) / 10 : 0,
      summaryCounts,
      finalStatusCounts,
    };
  }

  /** Totals across every campaign, live runs included. */
  async overview(): Promise<IOutboundCallCampaignOverview> {
    const campaigns = await this.repo.findAll();

    const campaignsByStatus: Record<OutboundCallCampaignStatus, number> = {
      DRAFT: 0,
      SCHEDULED: 0,
      RUNNING: 0,
      COMPLETED: 0,
      CANCELLED: 0,
      ABORTED: 0,
    };
    const clients = new Set<string>();
    let totalCalls = 0;
    let confirmedCalls = 0;

    for (const c of campaigns) {
      campaignsByStatus[c.status] += 1;
      if (c.clientReference) clients.add(c.clientReference);

      const active = this.activeRuns.get(c.id);
      const results = active ? active.aggregator.results() : await this.resultStore.list(c.id);
      totalCalls += results.length;
      confirmedCalls += results.filter((r) => r.summary === 'confirmed').length;
    }

    return {
      totalClients: clients.size,
      totalCampaigns: campaigns.length,
      campaignsByStatus,
      totalCalls,
      confirmedCalls,
      successRate: totalCalls ? Math.round((confirmedCalls / totalCalls) * 1000) / 10 : 0,
    };
  }

  /** Resolves once the campaign's current run (if any) is over and recorded. */
  async waitForRun(id: string): Promise<void> {
    await this.activeRuns.get(id)?.done;
  }

  async onModuleDestroy(): Promise<void> {
    const runs = [...this.activeRuns.values()];
    if (runs.length === 0) return;

    this.logger.warn(`[shutdown] cancelling ${runs.length} active run(s)`);
    for (const run of runs) run.controller.abort();
    await Promise.all(runs.map((run) => run.done));
  }

  // ---------------------------------------------------------------------------
  // Background run
  // ---------------------------------------------------------------------------

  private async consume(
    id: string,
    results: AsyncIterable<CampaignResult>,
    aggregator: ResultAggregator,
    signal: AbortSignal,
  ): Promise<void> {
    try {
      let status: OutboundCallCampaignStatus = Status.COMPLETED;
      let abortReason: string | null = null;

      try {
        for await (const r of results) {
          this.logger.debug(`[run] ${id}/${r.contactId} ${r.finalStatus}${r.errorKind ? ` (${r.errorKind})` : ''}`);
        }
        if (signal.aborted) status = Status.CANCELLED;
      } catch (e) {
        status = Status.ABORTED;
        abortReason = e instanceof CampaignAbortedError ? e.reason : messageOf(e);
        this.logger.error(`[run] campaign ${id} aborted: ${abortReason}`);
      }

      try {
        await aggregator.flush();
      } catch (e) {
        this.logger.error(`[run] campaign ${id}: some results were not persisted: ${messageOf(e)}`);
      }

      // cancel() or remove() may have moved the record on already
      const current = await this.repo.findById(id);
      if (current?.status !== Status.RUNNING) return;

      await this.repo.update(id, { status, completedAt: new Date(), abortReason });
      this.logger.log(`[run] campaign ${id} ${status.toLowerCase()}`, aggregator.snapshot());
    } finally {
      this.activeRuns.delete(id);
    }
  }

  private toRun(campaign: IOutboundCallCampaign, contacts: Contact[]): CampaignRun {
    const s = campaign.settings;
    return {
      campaignId: campaign.id,
      contacts,
      concurrencyLimit: s.concurrencyLimit,
      rateLimitPerMinute: s.rateLimitPerMinute,
      retryPolicy: {
        maxAttempts: s.maxAttempts,
        baseDelayMs: s.retryBaseDelayMs,
        maxDelayMs: s.retryMaxDelayMs,
      },
      scriptConfig: s.script,
      defaultCountry: s.defaultCountry,
      attemptTimeoutMs: s.attemptTimeoutMs,
      pollIntervalMs: s.pollIntervalMs,
      maxPollIntervalMs: s.maxPollIntervalMs,
    };
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private async ensureExists(id: string): Promise<IOutboundCallCampaign> {
    try {
      const found = await this.repo.findById(id);
      if (!found) throw new NotFoundException('Campaign not found');
      return found;
    } catch (e) {
      this.mapAndThrow(e, 'checking campaign existence', { id });
    }
  }

  private ensureFuture(d: Date, field: string) {
    if (d.getTime() <= Date.now()) {
      throw new BadRequestException(`${field} must be in the future`);
    }
  }

  private assertTransition(from: OutboundCallCampaignStatus, to: OutboundCallCampaignStatus) {
    const allowed = ALLOWED[from] ?? [];
    if (!allowed.includes(to)) {
      throw new BadRequestException(`Invalid status transition: ${from} → ${to}`);
    }
  }

  private mapAndThrow(error: unknown, when: string, meta?: Record<string, unknown>): never {
    if (error instanceof HttpException) {
      this.logger.warn(`[${when}] ${error.message}`, meta ?? {});
      throw error;
    }
    this.logger.error(`[${when}] ${messageOf(error)}`, meta ?? {});

    if (error instanceof RecordNotFoundError) throw new NotFoundException('Campaign not found');
    if (error instanceof ScriptConfigError) {
      throw new BadRequestException({ message: 'Invalid script config', issues: error.issues });
    }
    if (error instanceof RangeError) throw new BadRequestException(error.message);
    throw new InternalServerErrorException('Unexpected error while processing campaign');
  }
}
