export const PRICING_MODELS = ['Free', 'Freemium', 'Paid', 'Unknown'] as const;

export type PricingModel = (typeof PRICING_MODELS)[number];

export interface ToolRecord {
  name: string;
  category: string;
  primaryTask: string;
  description: string;
  keywords: string[];
  technologies: string[];
  industry: string;
  yearFounded?: number;
  country?: string;
  website: string;
  pricingModel: PricingModel;
}

export interface ToolMetadata {
  name: string;
  category: string;
  primaryTask: string;
  industry: string;
  pricingModel: PricingModel;
  website: string;
  country?: string;
  yearFounded?: number;
}

export interface ToolDocument {
  id: string;
  text: string;
  metadata: ToolMetadata;
}

export interface ScoredDocument extends ToolDocument {
  similarity: number;
}

export type ChatRole = 'user' | 'assistant';

export interface ChatTurn {
  role: ChatRole;
  content: string;
}

export type ConversationState = readonly ChatTurn[];

export interface QueryFilter {
  pricing: PricingModel[];
}

export const NO_FILTER: QueryFilter = { pricing: [] };
