/**
 * Email Receiver Worker
 * Consumes the incoming-email queue one job per received message
 */

import { Job, Worker } from 'bullmq';
import Redis from 'ioredis';
import { INCOMING_EMAIL_QUEUE, JobType } from '../queue';
import {
  IncomingEmailJobData,
  IncomingEmailJobDependencies,
  IncomingEmailJobResult,
  processIncomingEmail
} from '../incoming-email/email-receiver-job';

const WORKER_CONCURRENCY = 5;

export function createEmailReceiverWorker(
  connection: Redis,
  deps: IncomingEmailJobDependencies
): Worker<IncomingEmailJobData, IncomingEmailJobResult, JobType> {
  const worker = new Worker<IncomingEmailJobData, IncomingEmailJobResult, JobType>(
    INCOMING_EMAIL_QUEUE,
    async (job: Job<IncomingEmailJobData, IncomingEmailJobResult, JobType>) => processIncomingEmail(job.data, deps),
    { connection, concurrency: WORKER_CONCURRENCY }
  );

  worker.on('completed', (job, result) => {
    console.log(`[EmailReceiverWorker] Job ${job.id} ${result.status}`);
  });

  worker.on('failed', (job, error) => {
    console.error(`[EmailReceiverWorker] Job ${job?.id ?? 'unknown'} failed:`, error.message);
  });

  return worker;
}
