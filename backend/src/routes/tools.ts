import express, { type NextFunction, type Request, type Response } from 'express';
import type { PricingModel } from '../types';
import type { ToolRetriever } from '../services/retriever';

export function createToolsRouter(retriever: Pick<ToolRetriever, 'getIndex'>) {
  const router = express.Router();

  // Summary of the loaded index
  router.get('/stats', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { manifest, store } = await retriever.getIndex();

      const byPricing: Record<PricingModel, number> = { Free: 0, Freemium: 0, Paid: 0, Unknown: 0 };
      for (const entry of store.getAll()) {
        byPricing[entry.document.metadata.pricingModel]++;
      }

      res.json({
        status: manifest.status,
        count: store.size,
        embeddingModel: manifest.embeddingModel,
        dimension: manifest.dimension,
        updatedAt: manifest.updatedAt,
        byPricing,
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
