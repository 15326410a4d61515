import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { MESSAGES } from '../../config/lookup/constants';
import { LOOKUP_RULES } from '../../config/lookup/validationRules';
import { registerDownload } from '../../services/downloadService';
import { Match } from '../../types';
import { ServerDependencies } from '../dependencies';

const bodySchema = z.object({
  title: z.string().min(LOOKUP_RULES.titleMinLength).max(LOOKUP_RULES.titleMaxLength),
  first_author_last_name: z
    .string()
    .min(LOOKUP_RULES.authorMinLength)
    .max(LOOKUP_RULES.authorMaxLength)
});

export function toMatchPayload(match: Match) {
  const common = {
    source: match.source,
    title: match.title,
    doi: match.doi,
    year: match.year,
    authors: match.authors,
    first_author_last_name: match.firstAuthorLastName,
    score: match.score
  };
  if (match.source === 'crossref') {
    return { ...common, publisher: match.publisher, pdf_links: match.pdfLinks };
  }
  return {
    ...common,
    journal: match.journal,
    pdf_url: match.pdfUrl,
    is_open_access: match.isOpenAccess
  };
}

export async function registerLookupRoutes(
  app: FastifyInstance,
  deps: ServerDependencies
): Promise<void> {
  app.post('/api/lookup', { config: { rateLimit: { max: 30, timeWindow: '1 minute' } } }, async (req, reply) => {
    const parsed = bodySchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: parsed.error.flatten() });
    }

    const title = parsed.data.title.trim();
    const result = await deps.discover(
      { title, firstAuthorLastName: parsed.data.first_author_last_name.trim() },
      { log: req.log }
    );
    const { match, candidateUrls } = result;

    if (!match && candidateUrls.length === 0) {
      return reply.status(404).send({ error: MESSAGES.noMatch });
    }

    let download: { token: string; endpoint: string } | null = null;
    if (candidateUrls.length > 0) {
      const token = await registerDownload(
        deps.downloads,
        candidateUrls[0],
        match?.title || title,
        deps.now()
      );
      download = { token, endpoint: `/api/download/${token}` };
    }

    return reply.send({
      match: match ? toMatchPayload(match) : null,
      candidate_urls: candidateUrls,
      download_available: download !== null,
      download,
      warnings: result.warnings
    });
  });
}
