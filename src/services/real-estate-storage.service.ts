import { MongoClient, Db, Collection } from 'mongodb';
import { CONFIG } from '../config';
import type { CanonicalRecord, LocationRecord, SourcePlatform } from '../types';
import type { RecordSink } from './record-sink';

interface PriceChange {
  amount: number | null;
  changedAt: Date;
}

interface StoredListing extends CanonicalRecord {
  firstSeenAt: Date;
  lastSeenAt: Date;
  lastUpdatedAt: Date;
  priceHistory: PriceChange[];
}

interface StoredLocation extends LocationRecord {
  batchIds: string[];
  updatedAt: Date;
}

export interface ListingStats {
  totalListings: number;
  totalLocations: number;
  byPlatform: Partial<Record<SourcePlatform, number>>;
}

/**
 * RealEstateStorageService
 * MongoDB record sink: listings upserted by listingId with price history,
 * locations upserted by locationId
 */
export class RealEstateStorageService implements RecordSink {
  readonly name = 'mongodb';
  private client: MongoClient;
  private db: Db | null = null;
  private listings: Collection<StoredListing> | null = null;
  private locations: Collection<StoredLocation> | null = null;

  constructor(uri: string = CONFIG.mongodb.uri, private readonly database: string = CONFIG.mongodb.database) {
    this.client = new MongoClient(uri);
  }

  async connect(): Promise<void> {
    try {
      await this.client.connect();
      this.db = this.client.db(this.database);
      this.listings = this.db.collection<StoredListing>('listings');
      this.locations = this.db.collection<StoredLocation>('locations');

      await this.createIndexes();

      console.log(`Connected to MongoDB listings/locations collections (${this.database})`);
    } catch (error) {
      console.error('Failed to connect to MongoDB (listings):', error);
      throw error;
    }
  }

  private async createIndexes(): Promise<void> {
    if (!this.listings || !this.locations) return;

    try {
      await this.listings.createIndex({ listingId: 1 }, { unique: true });
      await this.listings.createIndex({ sourcePlatform: 1, externalId: 1 });
      await this.listings.createIndex({ batchId: 1 });
      await this.listings.createIndex({ locationId: 1 });
      await this.listings.createIndex({ listPrice: 1 });
      await this.listings.createIndex({ bedroomCount: 1, bathroomCount: 1 });
      await this.listings.createIndex({ 'address.city': 1, 'address.region': 1 });
      await this.listings.createIndex({ lastSeenAt: -1 });

      await this.locations.createIndex({ locationId: 1 }, { unique: true });
      await this.locations.createIndex({ postalCode: 1 });

      console.log('MongoDB listing indexes created');
    } catch (error) {
      console.error('Failed to create listing indexes:', error);
    }
  }

  async saveRecord(record: CanonicalRecord, pageIndex: number): Promise<void> {
    const collection = this.requireListings();
    const now = new Date();

    try {
      const existing = await collection.findOne({ listingId: record.listingId });

      if (existing) {
        const priceHistory = [...existing.priceHistory];
        if (record.listPrice !== existing.listPrice) {
          priceHistory.push({ amount: existing.listPrice, changedAt: now });
        }

        const updates: Partial<StoredListing> = {
          ...record,
          firstSeenAt: existing.firstSeenAt,
          lastSeenAt: now,
          lastUpdatedAt: now,
          priceHistory,
        };
        await collection.updateOne({ listingId: record.listingId }, { $set: updates });
        console.log(`✅ Updated listing ${record.listingId} (page ${pageIndex})`);
      } else {
        await collection.insertOne({
          ...record,
          firstSeenAt: now,
          lastSeenAt: now,
          lastUpdatedAt: now,
          priceHistory: [],
        });
        console.log(`✅ Inserted listing ${record.listingId} (page ${pageIndex})`);
      }
    } catch (error) {
      console.error(`Failed to upsert listing ${record.listingId}:`, error);
      throw error;
    }
  }

  async saveLocations(batchId: string, locations: LocationRecord[]): Promise<void> {
    const collection = this.requireLocations();
    if (locations.length === 0) return;

    const now = new Date();
    const result = await collection.bulkWrite(
      locations.map((location) => ({
        updateOne: {
          filter: { locationId: location.locationId },
          update: {
            $set: { ...location, updatedAt: now },
            $addToSet: { batchIds: batchId },
          },
          upsert: true,
        },
      }))
    );

    console.log(
      `✅ Location upsert complete for batch ${batchId}: ${result.upsertedCount} new, ${result.modifiedCount} updated`
    );
  }

  async getStats(): Promise<ListingStats | null> {
    if (!this.listings || !this.locations) {
      return null;
    }

    const [totalListings, totalLocations, byPlatform] = await Promise.all([
      this.listings.countDocuments(),
      this.locations.countDocuments(),
      this.listings
        .aggregate<{ _id: SourcePlatform; count: number }>([{ $group: { _id: '$sourcePlatform', count: { $sum: 1 } } }])
        .toArray(),
    ]);

    const counts: Partial<Record<SourcePlatform, number>> = {};
    for (const item of byPlatform) {
      counts[item._id] = item.count;
    }

    return { totalListings, totalLocations, byPlatform: counts };
  }

  async close(): Promise<void> {
    await this.client.close();
    console.log('Listing storage connection closed');
  }

  private requireListings(): Collection<StoredListing> {
    if (!this.listings) {
      throw new Error('MongoDB not connected. Call connect() first.');
    }
    return this.listings;
  }

  private requireLocations(): Collection<StoredLocation> {
    if (!this.locations) {
      throw new Error('MongoDB not connected. Call connect() first.');
    }
    return this.locations;
  }
}
