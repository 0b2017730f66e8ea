import express from 'express';
import type { Request, Response } from 'express';
import { fromCsvDecoder, inferSchema, toCsvEncoder } from './api/csvCalls';
import type { CallSettings } from './api/csvCalls';
import type { JsonValue } from './api/jsonValues';
import { RequestBody } from './api/requestBody';
import { codecConfig } from './config/codecConfig';
import type { CodecConfig, SessionConf } from './config/codecConfig';
import { PartitionRunner } from './engine/partitionRunner';
import { CsvCodecError } from './errors';
import { errorHandler } from './middleware/errorHandler';
import { typeToSQL } from './parsers/schemaDDL';

export type JobStatus = 'queued' | 'processing' | 'completed' | 'failed';

export interface DecodeJob {
  id: string;
  status: JobStatus;
  progress: number;
  completedPartitions: number;
  totalPartitions: number;
  schema: string;
  createdAt: string;
  updatedAt?: string;
  completedAt?: string;
  result?: { partitions: JsonValue[][] };
  error?: string;
  errorClass?: string;
}

export interface AppOptions {
  config?: CodecConfig;
  runner?: PartitionRunner;
}

function callSettings(body: RequestBody): CallSettings {
  return { options: body.options(), timeZone: body.optionalString('timeZone') };
}

/**
 * Builds the evaluation service. Jobs live in memory until their TTL expires.
 */
export function createApp({ config = codecConfig, runner }: AppOptions = {}): express.Express {
  const app = express();
  const partitionRunner = runner ?? new PartitionRunner(config.partitionConcurrency);
  const session: SessionConf = {
    sessionTimeZone: config.sessionTimeZone,
    columnNameOfCorruptRecord: config.columnNameOfCorruptRecord,
    verbose: config.verbose,
  };
  const jobs = new Map<string, DecodeJob>();

  const updateJob = (jobId: string, updates: Partial<DecodeJob>): void => {
    const current = jobs.get(jobId);
    if (current) {
      jobs.set(jobId, { ...current, ...updates, updatedAt: new Date().toISOString() });
    }
  };

  app.use(express.json({ limit: '10mb' }));

  app.get('/health', (req: Request, res: Response): void => {
    res.json({ status: 'ok', queue: partitionRunner.stats });
  });

  /**
   * API: decode CSV records with from_csv
   */
  app.post('/api/from_csv', (req: Request, res: Response): void => {
    const body = RequestBody.from(req);
    const { schema, decode } = fromCsvDecoder(body.requireString('schema'), callSettings(body), session);
    const rows = body.requireNullableStrings('values').map(decode);
    res.json({ success: true, schema: typeToSQL(schema), rows });
  });

  /**
   * API: encode rows with to_csv
   */
  app.post('/api/to_csv', (req: Request, res: Response): void => {
    const body = RequestBody.from(req);
    const encode = toCsvEncoder(body.requireString('schema'), callSettings(body), session);
    const records = body.requireArray('rows').map((row, i) => encode(row, `$.rows[${i}]`));
    res.json({ success: true, records });
  });

  /**
   * API: infer a schema with schema_of_csv
   */
  app.post('/api/schema_of_csv', (req: Request, res: Response): void => {
    const body = RequestBody.from(req);
    const schema = inferSchema(body.requireNullableString('csv'), body.options(), session);
    res.json({ success: true, schema });
  });

  /**
   * API: queue a batch decode over partitions (returns job ID for polling)
   */
  app.post('/api/jobs', (req: Request, res: Response): void => {
    const body = RequestBody.from(req);
    const schemaDDL = body.requireString('schema');
    const settings = callSettings(body);
    const partitions = body.requirePartitions('partitions');
    // bind once up front so configuration errors are reported synchronously
    const { schema } = fromCsvDecoder(schemaDDL, settings, session);

    const jobId = `job-${Date.now()}-${Math.round(Math.random() * 1e9)}`;
    jobs.set(jobId, {
      id: jobId,
      status: 'queued',
      progress: 0,
      completedPartitions: 0,
      totalPartitions: partitions.length,
      schema: typeToSQL(schema),
      createdAt: new Date().toISOString(),
    });
    console.log(`[API] Job ${jobId} queued with ${partitions.length} partition(s)`);

    setTimeout(() => {
      jobs.delete(jobId);
      console.log(`[API] Cleaned up job result: ${jobId}`);
    }, config.jobResultTtlMs).unref();

    partitionRunner
      .run(
        jobId,
        partitions,
        () => fromCsvDecoder(schemaDDL, settings, session).decode,
        ({ completedPartitions, totalPartitions }) => {
          updateJob(jobId, {
            status: 'processing',
            completedPartitions,
            progress: Math.floor((completedPartitions / Math.max(totalPartitions, 1)) * 100),
          });
        },
      )
      .then((results) => {
        updateJob(jobId, {
          status: 'completed',
          progress: 100,
          result: { partitions: results },
          completedAt: new Date().toISOString(),
        });
      })
      .catch((error: unknown) => {
        const errorMessage = error instanceof Error ? error.message : 'Unknown error';
        console.error(`[API] Job ${jobId} failed: ${errorMessage}`);
        updateJob(jobId, {
          status: 'failed',
          error: errorMessage,
          errorClass: error instanceof CsvCodecError ? error.errorClass : undefined,
        });
      });

    res.status(202).json({
      success: true,
      jobId,
      status: 'queued',
      totalPartitions: partitions.length,
      statusUrl: `/api/status/${jobId}`,
      resultUrl: `/api/result/${jobId}`,
    });
  });

  /**
   * API: Check job status
   */
  app.get('/api/status/:jobId', (req: Request, res: Response): void => {
    const job = jobs.get(req.params.jobId ?? '');
    if (!job) {
      res.status(404).json({ success: false, error: 'Job not found or expired' });
      return;
    }
    const { result: _result, ...status } = job;
    res.json({ success: true, job: status });
  });

  /**
   * API: Get job result (only if completed)
   */
  app.get('/api/result/:jobId', (req: Request, res: Response): void => {
    const job = jobs.get(req.params.jobId ?? '');
    if (!job) {
      res.status(404).json({ success: false, error: 'Job not found or expired' });
      return;
    }
    if (job.status !== 'completed') {
      res.status(400).json({
        success: false,
        error: `Job is ${job.status}, not completed`,
        status: job.status,
        progress: job.progress,
      });
      return;
    }
    res.json({ success: true, result: job.result });
  });

  app.use(errorHandler);

  return app;
}
