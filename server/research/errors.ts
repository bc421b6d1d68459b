import type { ZodIssue } from 'zod';
import type { FetchStatus } from './types';

export type ResearchErrorCode = 'RESEARCH_EXHAUSTED' | 'RESEARCH_ABORTED' | 'INVALID_QUERY';

export class ResearchError extends Error {
  readonly code: ResearchErrorCode;
  readonly retryable: boolean;

  constructor(code: ResearchErrorCode, message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ResearchError';
    this.code = code;
    this.retryable = options.retryable ?? false;
  }
}

/** No source yielded content, so no confidence score can be computed. */
export class ResearchExhaustedError extends ResearchError {
  readonly topic: string;
  readonly attempted: number;
  readonly tally: Record<FetchStatus, number>;

  constructor(topic: string, attempted: number, tally: Record<FetchStatus, number>) {
    super(
      'RESEARCH_EXHAUSTED',
      `Research exhausted for "${topic}": 0 of ${attempted} sources succeeded`,
      { retryable: true },
    );
    this.name = 'ResearchExhaustedError';
    this.topic = topic;
    this.attempted = attempted;
    this.tally = tally;
  }
}

export class ResearchAbortedError extends ResearchError {
  constructor(topic: string, cause?: unknown) {
    super('RESEARCH_ABORTED', `Research aborted for "${topic}"`, { retryable: true, cause });
    this.name = 'ResearchAbortedError';
  }
}

export class InvalidResearchQueryError extends ResearchError {
  readonly issues: ZodIssue[];

  constructor(issues: ZodIssue[]) {
    const summary = issues.map((issue) => `${issue.path.join('.') || 'query'}: ${issue.message}`).join('; ');
    super('INVALID_QUERY', `Invalid research query: ${summary}`);
    this.name = 'InvalidResearchQueryError';
    this.issues = issues;
  }
}
