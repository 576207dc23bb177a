'use client';

import { useEffect, useState } from 'react';
import { Save, Trash2 } from 'lucide-react';
import { Button } from '@/components/ui/button';
import { Card, CardContent, CardHeader, CardTitle } from '@/components/ui/card';
import { Input } from '@/components/ui/input';
import type { GrowthTableRow } from '@/types/growth';

type EditableColumn = keyof GrowthTableRow;

const columns: { id: EditableColumn; name: string; inputType: 'date' | 'number' }[] = [
  { id: 'Date', name: 'Date', inputType: 'date' },
  { id: 'Age_Days', name: 'Age (Days)', inputType: 'number' },
  { id: 'Weight_kg', name: 'Weight (kg)', inputType: 'number' },
];

interface GrowthTableProps {
  rows: GrowthTableRow[];
  disabled?: boolean;
  onRowsChange: (rows: GrowthTableRow[]) => void;
  onSave: (rows: GrowthTableRow[]) => void;
}

function cellText(value: GrowthTableRow[EditableColumn]): string {
  return value === null ? '' : String(value);
}

export function GrowthTable({ rows, disabled, onRowsChange, onSave }: GrowthTableProps) {
  const [draft, setDraft] = useState<GrowthTableRow[]>(rows);

  // Server rows replace local edits after every response
  useEffect(() => {
    setDraft(rows);
  }, [rows]);

  const updateCell = (index: number, column: EditableColumn, value: string) => {
    setDraft(current =>
      current.map((row, i) => (i === index ? { ...row, [column]: value } : row))
    );
  };

  // An edit is committed when the cell loses focus with a changed value
  const commitCell = (index: number, column: EditableColumn) => {
    const original = rows[index];
    const edited = draft[index];
    if (original && edited && cellText(original[column]) !== cellText(edited[column])) {
      onRowsChange(draft);
    }
  };

  const deleteRow = (index: number) => {
    const remaining = draft.filter((_, i) => i !== index);
    setDraft(remaining);
    onRowsChange(remaining);
  };

  return (
    <Card>
      <CardHeader className="pb-2">
        <div className="flex items-center justify-between">
          <CardTitle className="text-sm font-medium">Measurements</CardTitle>
          <Button size="sm" onClick={() => onSave(draft)} disabled={disabled}>
            <Save className="h-4 w-4" />
            Save Changes
          </Button>
        </div>
      </CardHeader>
      <CardContent className="p-0">
        {draft.length === 0 ? (
          <div className="px-4 py-6 text-center text-muted-foreground text-sm">
            No measurements recorded yet
          </div>
        ) : (
          <table className="w-full text-sm">
            <thead>
              <tr className="border-b text-left text-muted-foreground">
                {columns.map(column => (
                  <th key={column.id} className="px-4 py-2 font-medium">
                    {column.name}
                  </th>
                ))}
                <th className="w-12" />
              </tr>
            </thead>
            <tbody className="divide-y">
              {draft.map((row, index) => (
                <tr key={index}>
                  {columns.map(column => (
                    <td key={column.id} className="px-4 py-1">
                      <Input
                        aria-label={`${column.name} row ${index + 1}`}
                        type={column.inputType}
                        step={column.inputType === 'number' ? 'any' : undefined}
                        value={cellText(row[column.id])}
                        disabled={disabled}
                        onChange={(e) => updateCell(index, column.id, e.target.value)}
                        onBlur={() => commitCell(index, column.id)}
                        className="h-8 border-transparent shadow-none hover:border-input"
                      />
                    </td>
                  ))}
                  <td className="px-2">
                    <Button
                      variant="ghost"
                      size="icon"
                      className="h-8 w-8"
                      disabled={disabled}
                      onClick={() => deleteRow(index)}
                    >
                      <Trash2 className="h-4 w-4" />
                      <span className="sr-only">Delete row {index + 1}</span>
                    </Button>
                  </td>
                </tr>
              ))}
            </tbody>
          </table>
        )}
      </CardContent>
    </Card>
  );
}
