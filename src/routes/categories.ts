import { Router } from 'express';

import type { SkillTaxonomy } from '../nlp/taxonomy';

export const createCategoriesRouter = (taxonomy: SkillTaxonomy): Router => {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({ categories: taxonomy.categories() });
  });

  return router;
};
