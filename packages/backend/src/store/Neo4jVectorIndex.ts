import neo4j, { type Driver, type Integer, type Node, type Session, type SessionConfig } from "neo4j-driver";
import type {
  ChunkMetadata,
  KnowledgeChunk,
  VectorIndex,
  VectorSearchResult
} from "@medtriage/shared";
import { appConfig, type AppConfig } from "../config.js";

export interface Neo4jVectorIndexConfig {
  uri: string;
  user: string;
  password: string;
  database?: string;
  embeddingDimensions: number;
}

type AccessMode = "READ" | "WRITE";

const VECTOR_INDEX_NAME = "knowledge_chunk_embedding";

export class Neo4jVectorIndex implements VectorIndex {
  private driver: Driver | null = null;

  constructor(private readonly config: Neo4jVectorIndexConfig) {}

  static fromEnv(env: AppConfig = appConfig): Neo4jVectorIndex {
    return new Neo4jVectorIndex({
      uri: env.NEO4J_URI,
      user: env.NEO4J_USER,
      password: env.NEO4J_PASSWORD,
      database: env.NEO4J_DATABASE,
      embeddingDimensions: env.EMBEDDING_DIMENSIONS
    });
  }

  async connect(): Promise<void> {
    if (this.driver) {
      return;
    }

    this.driver = neo4j.driver(
      this.config.uri,
      neo4j.auth.basic(this.config.user, this.config.password)
    );

    try {
      await this.driver.verifyConnectivity();
      await this.ensureIndexes();
    } catch (error) {
      await this.disconnect();
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (!this.driver) {
      return;
    }

    await this.driver.close();
    this.driver = null;
  }

  async healthCheck(): Promise<boolean> {
    if (!this.driver) {
      return false;
    }

    try {
      await this.withSession("READ", async (session) => {
        await session.run("RETURN 1 AS ok");
      });
      return true;
    } catch {
      return false;
    }
  }

  async upsert(chunks: KnowledgeChunk[]): Promise<void> {
    if (chunks.length === 0) {
      return;
    }

    await this.withSession("WRITE", async (session) => {
      await session.run(
        `
        UNWIND $chunks AS chunk
        MERGE (c:KnowledgeChunk {id: chunk.id})
        SET
          c.content = chunk.content,
          c.source = chunk.source,
          c.chunkIndex = chunk.chunkIndex,
          c.hasImage = chunk.hasImage,
          c.imageId = chunk.imageId,
          c.type = chunk.type,
          c.embedding = chunk.embedding
        `,
        { chunks: chunks.map((chunk) => this.serializeChunk(chunk)) }
      );
    });
  }

  async search(vector: number[], k: number): Promise<VectorSearchResult[]> {
    if (vector.length === 0) {
      return [];
    }

    const safeK = Math.max(1, Math.floor(k));
    return this.withSession("READ", async (session) => {
      const result = await session.run(
        `
        CALL db.index.vector.queryNodes('${VECTOR_INDEX_NAME}', $k, $vector)
        YIELD node, score
        RETURN node, score
        ORDER BY score DESC
        `,
        { vector, k: neo4j.int(safeK) }
      );

      return result.records.map((record) => {
        const node: Node = record.get("node");
        const chunk = this.mapChunk(node);
        return {
          content: chunk.content,
          metadata: chunk.metadata,
          score: this.toNumber(record.get("score"))
        };
      });
    });
  }

  async getChunksBySource(source: string): Promise<KnowledgeChunk[]> {
    return this.withSession("READ", async (session) => {
      const result = await session.run(
        `
        MATCH (c:KnowledgeChunk {source: $source})
        RETURN c
        ORDER BY c.chunkIndex ASC
        `,
        { source }
      );

      return result.records.map((record) => {
        const node: Node = record.get("c");
        return this.mapChunk(node);
      });
    });
  }

  async count(): Promise<number> {
    return this.withSession("READ", async (session) => {
      const result = await session.run("MATCH (c:KnowledgeChunk) RETURN count(c) AS total");
      return this.toNumber(result.records[0]?.get("total"));
    });
  }

  private async ensureIndexes(): Promise<void> {
    const dimension = Math.max(1, Math.floor(this.config.embeddingDimensions));

    await this.withSession("WRITE", async (session) => {
      await session.run(
        `
        CREATE VECTOR INDEX ${VECTOR_INDEX_NAME} IF NOT EXISTS
        FOR (c:KnowledgeChunk) ON (c.embedding)
        OPTIONS {indexConfig: {\`vector.dimensions\`: ${dimension}, \`vector.similarity_function\`: 'cosine'}}
        `
      );
      await session.run(
        `CREATE CONSTRAINT knowledge_chunk_id_unique IF NOT EXISTS FOR (c:KnowledgeChunk) REQUIRE c.id IS UNIQUE`
      );
      await session.run(
        `CREATE INDEX knowledge_chunk_source IF NOT EXISTS FOR (c:KnowledgeChunk) ON (c.source)`
      );
    });
  }

  private withSession<T>(accessMode: AccessMode, fn: (session: Session) => Promise<T>): Promise<T> {
    const sessionConfig: SessionConfig = {
      defaultAccessMode: accessMode === "READ" ? neo4j.session.READ : neo4j.session.WRITE
    };
    if (this.config.database) {
      sessionConfig.database = this.config.database;
    }

    const session = this.getDriver().session(sessionConfig);

    return fn(session).finally(async () => {
      await session.close();
    });
  }

  private getDriver(): Driver {
    if (!this.driver) {
      throw new Error("Neo4jVectorIndex is not connected. Call connect() first.");
    }

    return this.driver;
  }

  private serializeChunk(chunk: KnowledgeChunk): Record<string, unknown> {
    if (!chunk.embedding || chunk.embedding.length === 0) {
      throw new Error(`Chunk ${chunk.id} has no embedding`);
    }

    return {
      id: chunk.id,
      content: chunk.content,
      source: chunk.metadata.source,
      chunkIndex: neo4j.int(chunk.metadata.chunkIndex),
      hasImage: chunk.metadata.hasImage ?? false,
      imageId: chunk.metadata.imageId ?? null,
      type: chunk.metadata.type ?? "text",
      embedding: chunk.embedding
    };
  }

  private mapChunk(node: Node): KnowledgeChunk {
    const props: Record<string, unknown> = node.properties;
    const metadata: ChunkMetadata = {
      source: typeof props.source === "string" ? props.source : "unknown",
      chunkIndex: this.toNumber(props.chunkIndex)
    };
    if (props.hasImage === true) {
      metadata.hasImage = true;
    }
    if (typeof props.imageId === "string") {
      metadata.imageId = props.imageId;
    }
    if (props.type === "text" || props.type === "multimodal") {
      metadata.type = props.type;
    }

    const chunk: KnowledgeChunk = {
      id: typeof props.id === "string" ? props.id : node.elementId,
      content: typeof props.content === "string" ? props.content : "",
      metadata
    };
    if (Array.isArray(props.embedding)) {
      chunk.embedding = props.embedding.map((value) => this.toNumber(value));
    }
    return chunk;
  }

  private toNumber(value: unknown, fallback = 0): number {
    if (typeof value === "number") {
      return Number.isFinite(value) ? value : fallback;
    }
    if (neo4j.isInt(value)) {
      return (value as Integer).toNumber();
    }
    return fallback;
  }
}
