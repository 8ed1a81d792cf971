import { useCallback, useEffect, useMemo, useRef, useState } from 'react';
import type { CustomerDirectory } from '../../../../src/services/customers/customerDirectory';

interface CustomerSelectProps {
  directory: CustomerDirectory;
  availableIds: string[];
  selectedId: string | null;
  disabled?: boolean;
  onSelect(customerId: string): void;
}

const CustomerSelect = ({ directory, availableIds, selectedId, disabled, onSelect }: CustomerSelectProps) => {
  const containerRef = useRef<HTMLDivElement | null>(null);
  const [open, setOpen] = useState(false);
  const [query, setQuery] = useState('');

  useEffect(() => {
    setQuery(selectedId ? `${selectedId} · ${directory.displayName(selectedId)}` : '');
  }, [directory, selectedId]);

  useEffect(() => {
    const handleClick = (event: MouseEvent) => {
      if (containerRef.current && event.target instanceof Node && !containerRef.current.contains(event.target)) {
        setOpen(false);
      }
    };
    document.addEventListener('mousedown', handleClick);
    return () => {
      document.removeEventListener('mousedown', handleClick);
    };
  }, []);

  const results = useMemo(() => {
    const searchText = open && query.includes(' · ') ? '' : query;
    return directory
      .search(searchText)
      .filter((match) => availableIds.includes(match.customer.customerId));
  }, [directory, availableIds, query, open]);

  const handleSelect = useCallback(
    (customerId: string) => {
      onSelect(customerId);
      setOpen(false);
    },
    [onSelect],
  );

  return (
    <div className="customer-select" ref={containerRef}>
      <input
        type="text"
        placeholder="Select customer"
        value={query}
        disabled={disabled}
        onFocus={() => setOpen(true)}
        onChange={(event) => {
          setQuery(event.target.value);
          setOpen(true);
        }}
      />
      {open && !disabled && (
        <ul className="customer-options" role="listbox">
          {results.length === 0 && <li className="customer-option empty">No matching customers</li>}
          {results.map(({ customer }) => (
            <li
              key={customer.customerId}
              role="option"
              aria-selected={customer.customerId === selectedId}
              className="customer-option"
              onMouseDown={(event) => {
                event.preventDefault();
                handleSelect(customer.customerId);
              }}
            >
              <span className="customer-id">{customer.customerId}</span>
              <span className="customer-name">{customer.legalName}</span>
            </li>
          ))}
        </ul>
      )}
    </div>
  );
};

export default CustomerSelect;
