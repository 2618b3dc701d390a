import {
  Collection,
  Db,
  Document,
  Filter,
  IndexSpecification,
  CreateIndexesOptions,
} from 'mongodb';
import {DatabaseConnection} from '../connection.js';

export interface IndexDefinition {
  spec: IndexSpecification;
  options?: CreateIndexesOptions;
}

/**
 * Shared collection access for the repositories.
 * @template T The document shape stored in the collection.
 */
export abstract class BaseRepository<T extends Document> {
  protected collectionName: string;

  protected constructor(collectionName: string) {
    this.collectionName = collectionName;
  }

  /** Indexes created by initializeIndexes(). */
  protected abstract readonly indexes: IndexDefinition[];

  protected async getCollection(): Promise<Collection<T>> {
    const db: Db = await DatabaseConnection.getInstance().connect();
    return db.collection<T>(this.collectionName);
  }

  async initializeIndexes(): Promise<void> {
    try {
      const collection = await this.getCollection();
      for (const {spec, options} of this.indexes) {
        await collection.createIndex(spec, options);
      }
      console.log(
        `[${this.constructor.name}] Indexes initialized on ${this.collectionName}`,
      );
    } catch (error) {
      console.error(
        `[${this.constructor.name}] Failed to initialize indexes:`,
        error,
      );
      throw new Error(
        `Failed to initialize indexes: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
  }

  async count(filter: Filter<T> = {}): Promise<number> {
    const collection = await this.getCollection();
    return collection.countDocuments(filter);
  }
}
