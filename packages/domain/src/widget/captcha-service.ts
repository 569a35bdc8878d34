/**
 * Arithmetic captcha for widget visitors
 *
 * Challenges are bound to the session that received them and are consumed
 * on a correct answer. Whether a session must solve one is decided by how
 * busy its client IP has been.
 */

import { randomBytes, randomInt } from 'node:crypto';

import { createLogger, type ServiceLogger, type SharedStore } from '@chatrouter/core';
import { z } from 'zod';

export interface CaptchaChallenge {
  token: string;
  question: string;
}

export interface CaptchaServiceOptions {
  enabled?: boolean;
  /** Challenge lifetime in seconds (default: 600) */
  ttlSeconds?: number;
  /** IP activity window in seconds (default: 600) */
  ipWindowSeconds?: number;
  /** Requests per window after which a challenge is required (default: 60) */
  ipThreshold?: number;
  /** Integer in [min, max) */
  randomInt?: (min: number, max: number) => number;
  logger?: ServiceLogger;
}

const StoredChallengeSchema = z.object({
  answer: z.string(),
  question: z.string(),
  sessionToken: z.string(),
});

type StoredChallenge = z.infer<typeof StoredChallengeSchema>;

export function challengeKey(token: string): string {
  return `captcha:challenge:${token}`;
}

export function pendingChallengeKey(sessionToken: string): string {
  return `captcha:pending:${sessionToken}`;
}

export function ipActivityKey(ip: string): string {
  return `captcha:ip:${ip}`;
}

/**
 * Build an `a op b = ?` question with operands in 2..9 and a non-negative answer
 */
export function createArithmeticQuestion(
  random: (min: number, max: number) => number = randomInt
): { question: string; answer: string } {
  let a = random(2, 10);
  let b = random(2, 10);
  const subtract = random(0, 2) === 1;

  if (subtract && b > a) {
    [a, b] = [b, a];
  }

  return subtract
    ? { question: `${a} - ${b} = ?`, answer: String(a - b) }
    : { question: `${a} + ${b} = ?`, answer: String(a + b) };
}

export class CaptchaService {
  readonly enabled: boolean;
  private readonly ttlSeconds: number;
  private readonly ipWindowSeconds: number;
  private readonly ipThreshold: number;
  private readonly random: (min: number, max: number) => number;
  private readonly logger: ServiceLogger;

  constructor(
    private readonly store: SharedStore,
    options: CaptchaServiceOptions = {}
  ) {
    this.enabled = options.enabled ?? true;
    this.ttlSeconds = options.ttlSeconds ?? 600;
    this.ipWindowSeconds = options.ipWindowSeconds ?? 600;
    this.ipThreshold = options.ipThreshold ?? 60;
    this.random = options.randomInt ?? randomInt;
    this.logger = options.logger ?? createLogger({ name: 'widget-captcha' });
  }

  /**
   * Count one request from the IP
   *
   * @returns true once the IP has reached the challenge threshold
   */
  async recordIpActivity(ip: string): Promise<boolean> {
    if (!this.enabled) return false;
    const count = await this.store.increment(ipActivityKey(ip), this.ipWindowSeconds);
    return count >= this.ipThreshold;
  }

  async issue(sessionToken: string): Promise<CaptchaChallenge> {
    const token = randomBytes(16).toString('base64url');
    const { question, answer } = createArithmeticQuestion(this.random);
    const stored: StoredChallenge = { answer, question, sessionToken };

    await this.store.set(challengeKey(token), JSON.stringify(stored), {
      ttlSeconds: this.ttlSeconds,
    });
    await this.store.set(pendingChallengeKey(sessionToken), token, {
      ttlSeconds: this.ttlSeconds,
    });

    this.logger.info({}, 'Captcha challenge issued');
    return { token, question };
  }

  /** The session's unsolved challenge, if one is still live */
  async outstanding(sessionToken: string): Promise<CaptchaChallenge | null> {
    const token = await this.store.get(pendingChallengeKey(sessionToken));
    if (token === null) return null;

    const challenge = await this.load(token);
    if (!challenge || challenge.sessionToken !== sessionToken) return null;

    return { token, question: challenge.question };
  }

  async outstandingOrIssue(sessionToken: string): Promise<CaptchaChallenge> {
    return (await this.outstanding(sessionToken)) ?? this.issue(sessionToken);
  }

  /**
   * Check an answer; a correct one consumes the challenge
   */
  async verify(sessionToken: string, token: string, answer: string): Promise<boolean> {
    const challenge = await this.load(token);
    if (!challenge || challenge.sessionToken !== sessionToken) {
      return false;
    }
    if (answer.trim() !== challenge.answer) {
      return false;
    }

    await this.store.delete(challengeKey(token));
    await this.store.delete(pendingChallengeKey(sessionToken));
    return true;
  }

  private async load(token: string): Promise<StoredChallenge | null> {
    const raw = await this.store.get(challengeKey(token));
    if (raw === null) return null;

    try {
      const parsed = StoredChallengeSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }
}
