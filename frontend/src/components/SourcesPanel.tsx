import { useState } from 'react';
import type { ToolSource } from '../types';

const PREVIEW_LENGTH = 300;

interface SourcesPanelProps {
  sources: ToolSource[];
}

const SourcesPanel = ({ sources }: SourcesPanelProps) => {
  const [open, setOpen] = useState(false);

  if (sources.length === 0) {
    return null;
  }

  return (
    <div className="mt-3">
      <button
        type="button"
        onClick={() => setOpen(prev => !prev)}
        className="text-sm text-blue-600 hover:text-blue-800 font-medium"
      >
        {open ? 'Hide sources' : `View sources (${sources.length})`}
      </button>

      {open && (
        <ol className="mt-2 space-y-2">
          {sources.map(source => (
            <li key={source.id} className="border border-gray-200 rounded-lg p-3 bg-white">
              <div className="flex items-center gap-2 mb-1">
                <span className="font-semibold text-gray-800">{source.metadata.name}</span>
                <span className="bg-purple-100 text-purple-800 text-xs font-semibold px-2 py-0.5 rounded">
                  {source.metadata.pricingModel}
                </span>
                {source.metadata.category && (
                  <span className="text-xs text-gray-500">{source.metadata.category}</span>
                )}
              </div>
              {source.metadata.website && (
                <a
                  href={source.metadata.website}
                  target="_blank"
                  rel="noreferrer"
                  className="text-xs text-blue-600 break-all"
                >
                  {source.metadata.website}
                </a>
              )}
              <p className="text-sm text-gray-600 mt-1 whitespace-pre-wrap">
                {source.text.length > PREVIEW_LENGTH ? `${source.text.slice(0, PREVIEW_LENGTH)}...` : source.text}
              </p>
            </li>
          ))}
        </ol>
      )}
    </div>
  );
};

export default SourcesPanel;
