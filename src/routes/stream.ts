import type { Response } from 'express';

import type { PipelineEvent } from '../types';

/** Writes each pipeline event as one line of NDJSON, then ends the response. */
export const streamEvents = async <T>(res: Response, events: AsyncIterable<PipelineEvent<T>>): Promise<void> => {
  res.status(200);
  res.setHeader('Content-Type', 'application/x-ndjson; charset=utf-8');
  res.setHeader('Cache-Control', 'no-cache');

  try {
    for await (const event of events) {
      res.write(`${JSON.stringify(event)}\n`);
    }
  } finally {
    res.end();
  }
};

export type ValidationIssue = {
  path?: string;
  message: string;
};

export const toValidationIssues = (issues: { path: (string | number)[]; message: string }[]): ValidationIssue[] =>
  issues.map((issue) => ({
    path: issue.path.join('.') || undefined,
    message: issue.message,
  }));
