import { useState, type FormEvent } from 'react';
import axios from 'axios';
import PricingFilter from './PricingFilter';
import SourcesPanel from './SourcesPanel';
import type { ChatResponse, DisplayMessage, PricingModel } from '../types';

const API_URL = import.meta.env.VITE_API_URL || '';

const SUGGESTED_PROMPTS = [
  { label: 'Free AI image generators', prompt: 'Show me free AI image generators' },
  { label: 'AI coding assistants', prompt: 'What are the best AI coding assistants?' },
  { label: 'AI writing tools', prompt: 'Recommend AI writing and content creation tools' },
  { label: 'Video generation tools', prompt: 'AI tools for video generation and editing' },
];

function requestError(err: unknown, fallback: string): string {
  if (axios.isAxiosError<{ error?: string }>(err)) {
    return err.response?.data?.error || fallback;
  }
  return fallback;
}

const ChatInterface = () => {
  const [sessionId, setSessionId] = useState<string | null>(null);
  const [messages, setMessages] = useState<DisplayMessage[]>([]);
  const [query, setQuery] = useState('');
  const [pricing, setPricing] = useState<PricingModel[]>([]);
  const [sending, setSending] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const sendQuery = async (text: string) => {
    const trimmed = text.trim();
    if (!trimmed) {
      setError('Please enter a question');
      return;
    }

    setSending(true);
    setError(null);

    try {
      const response = await axios.post<ChatResponse>(`${API_URL}/api/chat`, {
        ...(sessionId ? { sessionId } : {}),
        query: trimmed,
        pricing,
      });

      // The turn is only shown once the server has recorded it
      setSessionId(response.data.sessionId);
      setMessages(prev => [
        ...prev,
        { role: 'user', content: trimmed },
        { role: 'assistant', content: response.data.answer, sources: response.data.sources },
      ]);
      setQuery('');
    } catch (err) {
      setError(requestError(err, 'Error contacting the advisor'));
    } finally {
      setSending(false);
    }
  };

  const handleSubmit = (e: FormEvent) => {
    e.preventDefault();
    void sendQuery(query);
  };

  const handleReset = async () => {
    setError(null);
    try {
      if (sessionId) {
        await axios.post(`${API_URL}/api/chat/${encodeURIComponent(sessionId)}/reset`);
      }
      setMessages([]);
      setQuery('');
    } catch (err) {
      setError(requestError(err, 'Error resetting the conversation'));
    }
  };

  return (
    <div>
      <div className="flex items-center justify-between mb-4">
        <h2 className="text-xl font-semibold text-gray-800">Ask the advisor</h2>
        {messages.length > 0 && (
          <button
            type="button"
            onClick={() => void handleReset()}
            disabled={sending}
            className="text-sm text-red-600 hover:text-red-800 font-medium"
          >
            Reset conversation
          </button>
        )}
      </div>

      <div className="mb-4">
        <PricingFilter selected={pricing} onChange={setPricing} disabled={sending} />
      </div>

      <div className="flex flex-wrap gap-2 mb-6">
        {SUGGESTED_PROMPTS.map(({ label, prompt }) => (
          <button
            key={label}
            type="button"
            onClick={() => void sendQuery(prompt)}
            disabled={sending}
            className="text-sm bg-indigo-50 text-indigo-700 px-3 py-1 rounded-full hover:bg-indigo-100 disabled:opacity-50"
          >
            {label}
          </button>
        ))}
      </div>

      <div className="space-y-4 mb-6">
        {messages.map((message, i) => (
          <div
            key={i}
            className={
              message.role === 'user'
                ? 'ml-12 bg-blue-600 text-white rounded-lg px-4 py-3'
                : 'mr-12 bg-gray-50 border border-gray-200 rounded-lg px-4 py-3'
            }
          >
            <p className="leading-relaxed whitespace-pre-wrap">{message.content}</p>
            {message.sources && <SourcesPanel sources={message.sources} />}
          </div>
        ))}

        {messages.length === 0 && !sending && (
          <div className="text-center py-12 text-gray-500">
            <p>Ask about AI tools, e.g. "Best free AI tools for startups"</p>
            <p className="text-sm mt-2">Answers are grounded in the tool catalogue, with the listings used shown as sources</p>
          </div>
        )}
      </div>

      {error && (
        <div role="alert" className="bg-red-50 border border-red-200 text-red-800 px-4 py-3 rounded-lg mb-4">
          {error}
        </div>
      )}

      <form onSubmit={handleSubmit}>
        <div className="flex gap-2">
          <input
            type="text"
            value={query}
            onChange={(e) => setQuery(e.target.value)}
            placeholder="Ask me about AI tools..."
            aria-label="Question"
            className="flex-1 px-4 py-3 border border-gray-300 rounded-lg
              focus:outline-none focus:ring-2 focus:ring-blue-500 focus:border-transparent text-lg"
            disabled={sending}
          />
          <button
            type="submit"
            disabled={sending || !query.trim()}
            className="bg-blue-600 text-white px-8 py-3 rounded-lg
              hover:bg-blue-700 disabled:bg-gray-400 disabled:cursor-not-allowed
              transition-colors font-medium text-lg"
          >
            {sending ? 'Thinking...' : 'Send'}
          </button>
        </div>
      </form>
    </div>
  );
};

export default ChatInterface;
