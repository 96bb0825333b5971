import { Logger } from '@nestjs/common';
import type { StakingEventDto } from '@stakevault/shared/dto/staking';
import { appendFile, mkdir } from 'fs/promises';
import { join, resolve } from 'path';

export interface EventJournalLine extends StakingEventDto {
  operation: string;
  committedAt: string;
}

const logger = new Logger('EventJournal');

export function eventJournalFileName(committedAt: Date): string {
  return `staking-events-${committedAt.toISOString().slice(0, 10)}.log`;
}

/**
 * Appends the events one committed operation produced, one JSON line each,
 * to a per-day file under `directory`. Failures are logged, not raised.
 */
export async function appendEventJournal(
  directory: string | undefined,
  operation: string,
  events: StakingEventDto[],
  committedAt = new Date()
): Promise<void> {
  if (!directory || events.length === 0) {
    return;
  }

  const lines = events.map((event) => {
    const line: EventJournalLine = { ...event, operation, committedAt: committedAt.toISOString() };
    return `${JSON.stringify(line)}\n`;
  });

  try {
    const resolvedDir = resolve(directory);
    await mkdir(resolvedDir, { recursive: true });
    await appendFile(join(resolvedDir, eventJournalFileName(committedAt)), lines.join(''), 'utf8');
  } catch (error) {
    logger.warn(`Failed to journal ${events.length} event(s) from ${operation}: ${error instanceof Error ? error.message : String(error)}`);
  }
}
