import express from 'express';
import _ from 'lodash';
import { Logger } from '../services/Logger';

const logger = Logger.create('analysis-upstream-mock', { level: process.env.LOG_LEVEL });

// Paths that make the stand-in misbehave, for trying out failure handling locally
const FAILURE_PATHS: Record<string, number> = {
  '/unavailable': 503,
  '/rate-limited': 429,
  '/rejected': 400
};

function titleFromPath(pathname: string): string {
  const segment = _.last(pathname.split('/').filter(Boolean)) ?? 'untitled';
  return _.startCase(segment);
}

// Same url in, same result out
export function buildAnalysis(url: string): Record<string, unknown> {
  const parsed = new URL(url);
  const skills = parsed.searchParams.getAll('skill');

  return {
    job_title: titleFromPath(parsed.pathname),
    company_name: parsed.hostname,
    key_responsibilities: [],
    required_qualifications: [],
    preferred_skills: skills,
    salary_compensation: '',
    location_remote_options: parsed.searchParams.get('remote') === 'true' ? 'Remote' : '',
    source_url: url,
    summary: {
      remote_or_onsite: parsed.searchParams.get('remote') === 'true' ? 'remote' : 'onsite',
      skills,
      main_responsibility: ''
    }
  };
}

export function createAnalysisUpstreamApp(): express.Application {
  const app = express();
  app.use(express.json());

  app.get('/health', (req, res) => {
    res.json({ status: 'healthy', service: 'analysis-upstream-mock', timestamp: new Date().toISOString() });
  });

  app.post('/api/analyze', (req, res) => {
    const jobId: unknown = req.body?.job_id;
    const url: unknown = req.body?.url;

    if (typeof jobId !== 'string' || typeof url !== 'string') {
      res.status(400).json({ error: 'job_id and url are required' });
      return;
    }

    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      res.status(400).json({ error: 'url is not a valid URL' });
      return;
    }

    const failureStatus = FAILURE_PATHS[parsed.pathname];
    if (failureStatus !== undefined) {
      logger.warn(`Simulating status ${failureStatus} for job ${jobId}`);
      res.status(failureStatus).json({ error: 'Simulated upstream failure' });
      return;
    }

    logger.info(`Analyzed job ${jobId}`, { url });
    res.json({ job_id: jobId, result: buildAnalysis(url) });
  });

  return app;
}

if (require.main === module) {
  const port = Number(process.env.ANALYSIS_UPSTREAM_PORT || 3001);
  createAnalysisUpstreamApp().listen(port, () => {
    logger.info(`Analysis upstream mock running on port ${port}`);
  });
}
