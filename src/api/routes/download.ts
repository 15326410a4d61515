import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { MESSAGES } from '../../config/lookup/constants';
import { filenameFromContentDisposition, resolveDownload } from '../../services/downloadService';
import { UpstreamError } from '../../services/upstreamClient';
import { FullTextResponse } from '../../types';
import { ServerDependencies } from '../dependencies';

const paramsSchema = z.object({
  token: z.string().min(1)
});

export async function registerDownloadRoutes(
  app: FastifyInstance,
  deps: ServerDependencies
): Promise<void> {
  app.get('/api/download/:token', async (req, reply) => {
    const parsed = paramsSchema.safeParse(req.params);
    if (!parsed.success) {
      return reply.status(400).send({ error: parsed.error.flatten() });
    }

    const entry = await resolveDownload(deps.downloads, parsed.data.token, deps.now());
    if (!entry) {
      return reply.status(404).send({ error: MESSAGES.tokenNotFound });
    }

    let upstream: FullTextResponse;
    try {
      upstream = await deps.fetchFullText(entry.url);
    } catch (err) {
      if (!(err instanceof UpstreamError)) throw err;
      req.log.warn({ status: err.status, err: err.message }, 'full-text fetch failed');
      return reply.status(502).send({ error: `Failed to fetch upstream full text: ${err.message}` });
    }

    const mediaType = (upstream.contentType ?? '').split(';')[0].trim() || 'application/octet-stream';
    const filename = filenameFromContentDisposition(upstream.contentDisposition) ?? entry.filename;

    return reply
      .type(mediaType)
      .header('Content-Disposition', `attachment; filename="${filename}"`)
      .send(upstream.body);
  });
}
