import { mkdir } from 'node:fs/promises';
import path from 'node:path';

import { JSONFile } from 'lowdb/node';
import { z } from 'zod';

import type { ServiceRecord } from './crawler/types';

const ServiceRecordSchema = z.record(
  z.string(),
  z.union([z.string(), z.array(z.string()), z.null()])
);

const OutputDocumentSchema = z.array(ServiceRecordSchema);

/**
 * Writes the records as a JSON array. lowdb's adapter writes a temp file
 * beside the target and renames it, so a prior file is never left truncated.
 */
export async function writeRecords(file: string, records: ServiceRecord[]): Promise<string> {
  const target = path.resolve(file);
  const data = OutputDocumentSchema.parse(records);
  await mkdir(path.dirname(target), { recursive: true });
  await new JSONFile<ServiceRecord[]>(target).write(data);
  return target;
}
