import { SensorReading } from '@/types/detection.types';

export const minuteTimestamp = (i: number, hour: number = 10): string =>
  `2025-08-01T${String(hour + Math.floor(i / 60)).padStart(2, '0')}:${String(i % 60).padStart(2, '0')}:00Z`;

export const constantBatch = (
  size: number,
  values: Omit<SensorReading, 'timestamp'> = { temperature: 20, smoke: 0.01, wind: 5 }
): SensorReading[] =>
  Array.from({ length: size }, (_, i) => ({ timestamp: minuteTimestamp(i), ...values }));

// 20 constant readings with one fire-like sample (80 °C, smoke 0.5)
export const singleSpikeBatch = (index: number = 10): SensorReading[] => {
  const batch = constantBatch(20);
  batch[index] = { ...batch[index], temperature: 80, smoke: 0.5 };
  return batch;
};
