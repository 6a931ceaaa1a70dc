import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { JobOrchestrator } from '../../application/services/JobOrchestrator.js';
import { JOB_STATUSES, JobSnapshot, JobStatus } from '../../core/entities/ClassificationJob.js';
import { errorMessage } from '../../core/errors.js';

const classifyBatchShape = {
  items: z.array(z.string()).min(1).describe('Texts to classify'),
  categories: z.array(z.string()).min(1).describe('Candidate labels'),
};

const jobIdShape = {
  job_id: z.string().describe('The ID of the job'),
};

const listJobsShape = {
  status: z.enum(JOB_STATUSES).optional().describe('Filter jobs by status (optional)'),
};

const STATUS_EMOJI: Record<JobStatus, string> = {
  queued: '⏳',
  processing: '🔄',
  completed: '✅',
  failed: '❌',
  aborted: '⛔',
};

export function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

export function errorResult(prefix: string, error: unknown): CallToolResult {
  return {
    isError: true,
    content: [{ type: 'text', text: `${prefix}: ${errorMessage(error)}` }],
  };
}

function jsonBlock(value: unknown): string {
  return `\`\`\`json\n${JSON.stringify(value, null, 2)}\n\`\`\``;
}

function formatProgress(job: JobSnapshot): string {
  return `${Math.round(job.progress * 100)}%`;
}

/**
 * Tool bodies, independent of the MCP server so they can be called directly
 */
export function createJobToolHandlers(orchestrator: JobOrchestrator) {
  return {
    async classifyBatch({ items, categories }: { items: string[]; categories: string[] }): Promise<CallToolResult> {
      try {
        const receipt = orchestrator.submit({ items, categories });
        return textResult(`# Job Submitted

- **Job ID**: ${receipt.id}
- **Items**: ${receipt.total}
- **Status**: ${receipt.status}

Use \`get-job-status\` to follow progress and \`get-job-results\` once it completes.

${jsonBlock(receipt)}`);
      } catch (error) {
        return errorResult('Error submitting job', error);
      }
    },

    async getJobStatus({ job_id }: { job_id: string }): Promise<CallToolResult> {
      try {
        const job = orchestrator.query(job_id);
        return textResult(`# ${STATUS_EMOJI[job.status]} Job ${job.id}

- **Status**: ${job.status}
- **Progress**: ${formatProgress(job)} of ${job.total} items
${job.duration !== undefined ? `- **Duration**: ${job.duration.toFixed(1)}s\n` : ''}${job.error ? `- **Error**: ${job.error}\n` : ''}
${jsonBlock({ ...job, results: undefined, log: undefined })}`);
      } catch (error) {
        return errorResult('Error getting job status', error);
      }
    },

    async getJobResults({ job_id }: { job_id: string }): Promise<CallToolResult> {
      try {
        const view = orchestrator.results(job_id);
        const lines = view.results.map((result, index) => `${index + 1}. "${result.item}" → **${result.predictedLabel}**`);
        return textResult(`# Results for ${view.id}

${lines.join('\n')}

${jsonBlock(view)}`);
      } catch (error) {
        return errorResult('Error getting job results', error);
      }
    },

    async getJobLog({ job_id }: { job_id: string }): Promise<CallToolResult> {
      try {
        const view = orchestrator.log(job_id);
        return textResult(`# Log for ${view.id}

\`\`\`
${view.log || '(empty)'}
\`\`\``);
      } catch (error) {
        return errorResult('Error getting job log', error);
      }
    },

    async cancelJob({ job_id }: { job_id: string }): Promise<CallToolResult> {
      try {
        const receipt = orchestrator.cancel(job_id);
        return textResult(`# ⛔ Job Cancelled

${receipt.message}

${jsonBlock(receipt)}`);
      } catch (error) {
        return errorResult('Error cancelling job', error);
      }
    },

    async listJobs({ status }: { status?: JobStatus }): Promise<CallToolResult> {
      try {
        const jobs = orchestrator.list(status).map((job) => ({
          id: job.id,
          status: job.status,
          progress: formatProgress(job),
          total: job.total,
          createdAt: job.createdAt.toISOString(),
          completedAt: job.completedAt?.toISOString(),
          error: job.error,
        }));
        const health = orchestrator.health();

        return textResult(`# Classification Jobs

- Active: ${health.activeJobCount}
- Total: ${health.totalJobCount}

## Jobs
${jobs.length === 0 ? 'No jobs found' : jsonBlock(jobs)}`);
      } catch (error) {
        return errorResult('Error listing jobs', error);
      }
    },
  };
}

/**
 * Register all job tools
 */
export function registerJobManagementTools(server: McpServer, orchestrator: JobOrchestrator): void {
  const handlers = createJobToolHandlers(orchestrator);

  server.tool(
    'classify-batch',
    'Submit a batch of texts for zero-shot classification against the given categories. Returns a job id immediately.',
    classifyBatchShape,
    (args) => handlers.classifyBatch(args)
  );

  server.tool(
    'get-job-status',
    'Get status, progress and duration of a classification job',
    jobIdShape,
    (args) => handlers.getJobStatus(args)
  );

  server.tool(
    'get-job-results',
    'Get the per-item results of a completed classification job',
    jobIdShape,
    (args) => handlers.getJobResults(args)
  );

  server.tool('get-job-log', 'Get the captured execution log of a job', jobIdShape, (args) => handlers.getJobLog(args));

  server.tool('cancel-job', 'Cancel a queued or running classification job', jobIdShape, (args) =>
    handlers.cancelJob(args)
  );

  server.tool('list-jobs', 'List classification jobs, newest first', listJobsShape, (args) => handlers.listJobs(args));
}
