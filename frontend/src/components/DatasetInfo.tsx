import { useEffect, useState } from 'react';
import axios from 'axios';
import { PRICING_OPTIONS, type ToolStats } from '../types';

const API_URL = import.meta.env.VITE_API_URL || '';

const DatasetInfo = () => {
  const [stats, setStats] = useState<ToolStats | null>(null);
  const [unavailable, setUnavailable] = useState(false);

  useEffect(() => {
    let cancelled = false;

    const fetchStats = async () => {
      try {
        const response = await axios.get<ToolStats>(`${API_URL}/api/tools/stats`);
        if (!cancelled) setStats(response.data);
      } catch {
        if (!cancelled) setUnavailable(true);
      }
    };

    void fetchStats();
    return () => {
      cancelled = true;
    };
  }, []);

  if (unavailable) {
    return (
      <section aria-label="Dataset info" className="text-sm text-gray-500 mb-6">
        Dataset info unavailable. Has the index been built?
      </section>
    );
  }

  if (!stats) {
    return null;
  }

  return (
    <section aria-label="Dataset info" className="bg-indigo-50 rounded-lg px-4 py-3 mb-6 text-sm text-gray-700">
      <p className="font-medium">{stats.count} tools indexed</p>
      {stats.status !== 'complete' && (
        <p className="text-amber-700">Index is {stats.status}; some tools may be missing.</p>
      )}
      <ul className="flex flex-wrap gap-4 mt-1">
        {PRICING_OPTIONS.map(option => (
          <li key={option}>
            {option}: {stats.byPricing[option]}
          </li>
        ))}
      </ul>
    </section>
  );
};

export default DatasetInfo;
