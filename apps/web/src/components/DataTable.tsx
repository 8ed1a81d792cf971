import type { ReactNode } from 'react';

interface Column<T> {
  header: string;
  accessor: keyof T | ((row: T) => ReactNode);
  width?: string;
}

interface DataTableProps<T> {
  columns: Column<T>[];
  rows: T[];
  rowKey: (row: T, index: number) => string;
  onRowClick?: (row: T) => void;
  /** Rows failing this check render without a click handler. Defaults to every row. */
  isRowClickable?: (row: T) => boolean;
  emptyMessage?: string;
}

const getValue = <T,>(row: T, accessor: Column<T>['accessor']): ReactNode => {
  if (typeof accessor === 'function') {
    return accessor(row);
  }
  const value = row[accessor];
  return typeof value === 'string' || typeof value === 'number' ? value : null;
};

function DataTable<T>({
  columns,
  rows,
  rowKey,
  onRowClick,
  isRowClickable = () => true,
  emptyMessage = 'No data yet.',
}: DataTableProps<T>) {
  if (rows.length === 0) {
    return <p className="table-empty">{emptyMessage}</p>;
  }

  return (
    <div className="table-wrapper">
      <table>
        <thead>
          <tr>
            {columns.map((column) => (
              <th key={column.header} style={{ width: column.width }}>
                {column.header}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {rows.map((row, index) => {
            const handleClick = onRowClick && isRowClickable(row) ? onRowClick : undefined;
            return (
              <tr
                key={rowKey(row, index)}
                className={handleClick ? 'clickable' : undefined}
                onClick={handleClick ? () => handleClick(row) : undefined}
              >
                {columns.map((column) => (
                  <td key={column.header}>{getValue(row, column.accessor)}</td>
                ))}
              </tr>
            );
          })}
        </tbody>
      </table>
    </div>
  );
}

export default DataTable;
