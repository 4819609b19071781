// src/callModules/call-client/bland-call.client.ts
import { Logger } from '@nestjs/common';
import axios, { AxiosAdapter, AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import { z } from 'zod';

import { CallClientError, CallErrorKind, RemoteCallErrorKind } from '../../common/errors/call-errors';
import type { NormalizedPhone } from '../phone-number/interface/normalized-phone.interface';
import type { ScriptConfig } from './schema/script-config.schema';
import type { CallClient, CallHandle, RemoteCallStatus, Transcript } from './interface/call-client.interface';

export interface BlandCallClientOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  /** Replaces axios' transport; tests plug an in-process adapter here. */
  adapter?: AxiosAdapter;
}

// ---------------------------------------------------------------------------
// Provider payloads
// ---------------------------------------------------------------------------

const InitiateResponseSchema = z.object({ call_id: z.string().min(1) }).passthrough();

const CallDetailsSchema = z
  .object({
    status: z.string().nullable().optional(),
    queue_status: z.string().nullable().optional(),
    completed: z.boolean().nullable().optional(),
    error_message: z.string().nullable().optional(),
    call_length: z.number().nullable().optional(), // minutes
    corrected_duration: z.union([z.string(), z.number()]).nullable().optional(), // seconds
    concatenated_transcript: z.string().nullable().optional(),
    transcripts: z
      .array(z.object({ user: z.string().optional(), text: z.string() }).passthrough())
      .nullable()
      .optional(),
  })
  .passthrough();

type CallDetails = z.infer<typeof CallDetailsSchema>;

const FAILED = new Set(['failed', 'error', 'no-answer', 'busy', 'canceled', 'cancelled']);
const DONE = new Set(['completed', 'complete']);

/**
 * CallClient over the Bland AI REST API (POST /calls, GET /calls/:id).
 *
 * HTTP status mapping: 401/403 AuthError, 429 RateLimited, 5xx and transport
 * failures ServiceUnavailable, any other non-2xx CallRejected.
 */
export class BlandCallClient implements CallClient {
  private readonly logger = new Logger(BlandCallClient.name);
  private readonly http: AxiosInstance;

  constructor(options: BlandCallClientOptions) {
    this.http = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      headers: {
        Authorization: `Bearer ${options.apiKey}`,
        'Content-Type': 'application/json',
      },
      validateStatus: () => true,
      ...(options.adapter && { adapter: options.adapter }),
    });
  }

  async initiate(phone: NormalizedPhone, script: ScriptConfig): Promise<CallHandle> {
    const payload = {
      phone_number: phone.e164,
      task: script.task,
      voice: script.voice,
      language: script.language,
      max_duration: script.maxDurationSeconds,
      record: script.record,
      wait_for_greeting: script.waitForGreeting,
      answered_by_enabled: script.answeredByEnabled,
      amd: script.answeredByEnabled,
      ...(script.firstSentence ? { first_sentence: script.firstSentence } : {}),
      ...(script.voicemailMessage ? { voicemail_message: script.voicemailMessage } : {}),
    };

    const data = await this.request('initiate', { method: 'POST', url: '/calls', data: payload }, InitiateResponseSchema);
    this.logger.log(`[initiate] call ${data.call_id} placed to ${phone.e164}`);
    return { callId: data.call_id, phone };
  }

  async pollStatus(handle: CallHandle): Promise<RemoteCallStatus> {
    return this.toStatus(await this.details('pollStatus', handle));
  }

  async fetchTranscript(handle: CallHandle): Promise<Transcript | undefined> {
    const details = await this.details('fetchTranscript', handle);

    const text =
      details.concatenated_transcript ??
      details.transcripts?.map((t) => `${t.user ?? 'unknown'}: ${t.text}`).join('\n');
    if (text == null) return undefined;

    const durationSeconds = this.durationOf(details);
    return { text, ...(durationSeconds !== undefined && { durationSeconds }) };
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private details(op: string, handle: CallHandle): Promise<CallDetails> {
    return this.request(
      op,
      { method: 'GET', url: `/calls/${encodeURIComponent(handle.callId)}` },
      CallDetailsSchema,
    );
  }

  private toStatus(details: CallDetails): RemoteCallStatus {
    const status = (details.status ?? '').toLowerCase();
    const queue = (details.queue_status ?? '').toLowerCase();

    if (FAILED.has(status) || FAILED.has(queue)) return 'Failed';
    if (details.completed === true || DONE.has(status) || DONE.has(queue)) {
      return details.error_message ? 'Failed' : 'Succeeded';
    }
    return 'Pending';
  }

  private durationOf(details: CallDetails): number | undefined {
    const corrected = Number(details.corrected_duration);
    if (details.corrected_duration != null && Number.isFinite(corrected)) return Math.round(corrected);
    if (details.call_length != null) return Math.round(details.call_length * 60);
    return undefined;
  }

  private async request<S extends z.ZodTypeAny>(
    op: string,
    config: AxiosRequestConfig,
    schema: S,
  ): Promise<z.infer<S>> {
    let res: AxiosResponse<unknown>;
    try {
      res = await this.http.request<unknown>(config);
    } catch (err) {
      const message = axios.isAxiosError(err) ? `${err.code ?? 'network error'}: ${err.message}` : String(err);
      this.logger.warn(`[${op}] transport failure: ${message}`);
      throw new CallClientError(CallErrorKind.ServiceUnavailable, `[${op}] ${message}`);
    }

    if (res.status < 200 || res.status >= 300) {
      const kind = this.kindForStatus(res.status);
      const detail = typeof res.data === 'string' ? res.data : JSON.stringify(res.data ?? null);
      this.logger.warn(`[${op}] provider answered ${res.status} (${kind})`);
      throw new CallClientError(kind, `[${op}] ${res.status}: ${detail}`, res.status);
    }

    const parsed = schema.safeParse(res.data);
    if (!parsed.success) {
      throw new CallClientError(CallErrorKind.ServiceUnavailable, `[${op}] unexpected response shape`, res.status);
    }
    return parsed.data;
  }

  private kindForStatus(status: number): RemoteCallErrorKind {
    if (status === 401 || status === 403) return CallErrorKind.AuthError;
    if (status === 429) return CallErrorKind.RateLimited;
    if (status >= 500) return CallErrorKind.ServiceUnavailable;
    return CallErrorKind.CallRejected;
  }
}
