'use client';

import { useState } from 'react';
import { Plus } from 'lucide-react';
import { Button } from '@/components/ui/button';
import { Input } from '@/components/ui/input';
import { Label } from '@/components/ui/label';
import type { AddRecordInput } from '@/lib/growth-store';
import { addDays, getTodayDate } from '@/lib/utils';

interface GrowthRecordFormProps {
  disabled?: boolean;
  onAdd: (input: AddRecordInput) => void;
}

export function GrowthRecordForm({ disabled, onAdd }: GrowthRecordFormProps) {
  const [dateOfBirth, setDateOfBirth] = useState(() => addDays(getTodayDate(), -14));
  const [measurementDate, setMeasurementDate] = useState(getTodayDate);
  const [weight, setWeight] = useState('');

  // Incomplete input is still sent: the server answers with "No changes made."
  const handleAdd = () => {
    onAdd({ dateOfBirth, measurementDate, weight });
  };

  return (
    <div className="grid gap-4 sm:grid-cols-[1fr_1fr_1fr_auto] sm:items-end">
      <div className="grid gap-2">
        <Label htmlFor="dob">Date of Birth:</Label>
        <Input
          id="dob"
          type="date"
          value={dateOfBirth}
          onChange={(e) => setDateOfBirth(e.target.value)}
        />
      </div>
      <div className="grid gap-2">
        <Label htmlFor="measurement-date">Date of Measurement:</Label>
        <Input
          id="measurement-date"
          type="date"
          value={measurementDate}
          onChange={(e) => setMeasurementDate(e.target.value)}
        />
      </div>
      <div className="grid gap-2">
        <Label htmlFor="weight">Weight (kg):</Label>
        <Input
          id="weight"
          type="number"
          step="0.01"
          placeholder="Enter weight in kg"
          value={weight}
          onChange={(e) => setWeight(e.target.value)}
        />
      </div>
      <Button onClick={handleAdd} disabled={disabled}>
        <Plus className="h-4 w-4" />
        Add Record
      </Button>
    </div>
  );
}
