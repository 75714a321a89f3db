export const PRICING_OPTIONS = ['Free', 'Freemium', 'Paid', 'Unknown'] as const;

export type PricingModel = (typeof PRICING_OPTIONS)[number];

export interface ToolSource {
  id: string;
  text: string;
  similarity: number;
  metadata: {
    name: string;
    category: string;
    primaryTask: string;
    industry: string;
    pricingModel: PricingModel;
    website: string;
    country?: string;
    yearFounded?: number;
  };
}

export interface ChatResponse {
  sessionId: string;
  answer: string;
  sources: ToolSource[];
}

export interface DisplayMessage {
  role: 'user' | 'assistant';
  content: string;
  sources?: ToolSource[];
}

export interface ToolStats {
  status: 'building' | 'partial' | 'complete';
  count: number;
  embeddingModel: string;
  dimension: number | null;
  updatedAt: string;
  byPricing: Record<PricingModel, number>;
}
