import { PRICING_OPTIONS, type PricingModel } from '../types';

interface PricingFilterProps {
  selected: PricingModel[];
  onChange: (selected: PricingModel[]) => void;
  disabled?: boolean;
}

const PricingFilter = ({ selected, onChange, disabled }: PricingFilterProps) => {
  const toggle = (option: PricingModel) => {
    onChange(
      selected.includes(option)
        ? selected.filter(value => value !== option)
        : PRICING_OPTIONS.filter(value => value === option || selected.includes(value))
    );
  };

  return (
    <fieldset className="flex flex-wrap items-center gap-3" disabled={disabled}>
      <legend className="text-sm font-medium text-gray-700 mb-2">Pricing model</legend>
      {PRICING_OPTIONS.map(option => (
        <label key={option} className="flex items-center gap-1 text-sm text-gray-700">
          <input
            type="checkbox"
            checked={selected.includes(option)}
            onChange={() => toggle(option)}
            className="rounded border-gray-300 text-blue-600 focus:ring-blue-500"
          />
          {option}
        </label>
      ))}
    </fieldset>
  );
};

export default PricingFilter;
