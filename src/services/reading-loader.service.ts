import fs from 'fs';
import path from 'path';
import csv from 'csv-parser';
import { SensorReading } from '@/types/detection.types';
import { SensorReadingSchema, toValidationIssues } from '@/services/reading-validation.service';
import { logger } from '@/utils/logger';

interface CSVRow {
  timestamp?: string;
  temperature?: string;
  smoke?: string;
  wind?: string;
}

export interface LoaderResult {
  success: boolean;
  file: string;
  readings: SensorReading[];
  total_rows: number;
  errors: string[];
}

// Empty cells become undefined so the schema reports them as missing
const toNumber = (value: string | undefined): number | undefined => {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return Number(value);
};

const collectRow = (result: LoaderResult, raw: unknown, rowLabel: string): void => {
  result.total_rows++;
  const parsed = SensorReadingSchema.safeParse(raw);

  if (parsed.success) {
    result.readings.push(parsed.data);
    return;
  }

  for (const issue of toValidationIssues(parsed.error)) {
    result.errors.push(`${rowLabel} ${issue.field}: ${issue.message}`);
  }
};

const parseCSV = (filePath: string, result: LoaderResult): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    fs.createReadStream(filePath)
      .pipe(csv({ mapHeaders: ({ header }) => header.trim().toLowerCase() }))
      .on('data', (row: CSVRow) => {
        collectRow(result, {
          timestamp: row.timestamp?.trim(),
          temperature: toNumber(row.temperature),
          smoke: toNumber(row.smoke),
          wind: toNumber(row.wind),
        }, `Row ${result.total_rows + 1}`);
      })
      .on('end', () => resolve())
      .on('error', (error) => reject(error));
  });

const parseJSON = async (filePath: string, result: LoaderResult): Promise<void> => {
  const content = await fs.promises.readFile(filePath, 'utf-8');
  const raw: unknown = JSON.parse(content);

  if (!Array.isArray(raw)) {
    throw new Error('JSON reading file must contain an array of readings');
  }

  raw.forEach((item: unknown, index: number) => collectRow(result, item, `Item ${index}`));
};

/**
 * Load a reading batch from a .json (array of readings) or .csv
 * (timestamp,temperature,smoke,wind) file. Invalid rows are reported and skipped.
 */
export async function loadReadingsFile(filePath: string): Promise<LoaderResult> {
  const result: LoaderResult = {
    success: false,
    file: filePath,
    readings: [],
    total_rows: 0,
    errors: []
  };

  try {
    if (!fs.existsSync(filePath)) {
      throw new Error(`Reading file not found: ${filePath}`);
    }

    const extension = path.extname(filePath).toLowerCase();
    if (extension === '.csv') {
      await parseCSV(filePath, result);
    } else if (extension === '.json') {
      await parseJSON(filePath, result);
    } else {
      throw new Error(`Unsupported reading file type: ${extension || '(none)'}`);
    }

    result.success = result.errors.length === 0;

    logger.info(`Loaded ${result.readings.length}/${result.total_rows} readings from ${path.basename(filePath)}`, {
      errors: result.errors.length
    });

    return result;

  } catch (error) {
    result.success = false;
    result.errors.push(error instanceof Error ? error.message : 'Unknown error');
    logger.error('Reading file loading failed', { file: filePath, error: result.errors });
    return result;
  }
}
