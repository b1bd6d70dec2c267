import { promises as fs } from 'fs';
import path from 'path';
import type { CanonicalRecord, LocationRecord } from '../types';
import type { RecordSink } from './record-sink';
import { pageFileStem } from './page-store.service';

/**
 * BatchFolderSink
 * Writes one pretty-printed JSON file per page next to the raw pages:
 * <root>/<batchId>/structured/<NNNN>.json and structured/locations.json
 */
export class BatchFolderSink implements RecordSink {
  readonly name = 'folder';

  constructor(private readonly root: string) {}

  structuredDir(batchId: string): string {
    return path.join(this.root, batchId, 'structured');
  }

  async saveRecord(record: CanonicalRecord, pageIndex: number): Promise<void> {
    const filePath = path.join(this.structuredDir(record.batchId), `${pageFileStem(pageIndex)}.json`);
    await this.writeJson(filePath, record);
    console.log(`✅ Parsed ${pageIndex} -> ${filePath}`);
  }

  async saveLocations(batchId: string, locations: LocationRecord[]): Promise<void> {
    const filePath = path.join(this.structuredDir(batchId), 'locations.json');
    await this.writeJson(filePath, locations);
    console.log(`✅ Wrote ${locations.length} locations -> ${filePath}`);
  }

  private async writeJson(filePath: string, value: unknown): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
  }
}
