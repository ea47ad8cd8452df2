import { JobsOptions, Queue } from 'bullmq';
import Redis from 'ioredis';
import { IncomingEmailJobData, IncomingEmailJobResult, encodeRawEmail } from './incoming-email/email-receiver-job';

export const INCOMING_EMAIL_QUEUE = 'incoming-email';

export enum JobType {
  PROCESS_INCOMING_EMAIL = 'process-incoming-email'
}

/**
 * Every rejection is permanent for the same input, so jobs are never retried
 */
export const INCOMING_EMAIL_JOB_OPTIONS: JobsOptions = {
  removeOnComplete: {
    count: 100,  // Keep last 100 completed jobs
    age: 3600    // Remove completed jobs older than 1 hour
  },
  removeOnFail: {
    count: 50,   // Keep last 50 failed jobs
    age: 7200    // Remove failed jobs older than 2 hours
  },
  attempts: 1
};

export type IncomingEmailQueue = Queue<IncomingEmailJobData, IncomingEmailJobResult, JobType>;

export function createIncomingEmailQueue(connection: Redis): IncomingEmailQueue {
  return new Queue<IncomingEmailJobData, IncomingEmailJobResult, JobType>(INCOMING_EMAIL_QUEUE, {
    connection,
    defaultJobOptions: INCOMING_EMAIL_JOB_OPTIONS
  });
}

export async function addIncomingEmailJob(queue: IncomingEmailQueue, raw: Buffer): Promise<string | undefined> {
  const job = await queue.add(JobType.PROCESS_INCOMING_EMAIL, {
    rawBase64: encodeRawEmail(raw),
    receivedAt: new Date().toISOString()
  });
  return job.id;
}
