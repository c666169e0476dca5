import type { DocumentRecord } from "../../../core/document/DocumentRecord";
import { readJsonArtifact, writeJsonArtifact } from "../../../core/cache/cacheGuard";
import { ProcessingError } from "../../../core/errors";
import { parseElements, type DocumentElement } from "../../../core/processing/elements";
import type { ProcessingStageName } from "../../../core/stages";
import type { DocumentChunker, DocumentEmbedder, DocumentPartitioner } from "../../../ports/DocumentProcessors";
import type { UploadStager } from "../../../ports/DestinationStore";
import type { ProcessingStage, StageContext, StageIO } from "../../../ports/Stage";

export const readElementsArtifact = async (
  inputPath: string,
  record: DocumentRecord,
  stage: ProcessingStageName
): Promise<DocumentElement[]> => {
  const parsed = parseElements(await readJsonArtifact(inputPath));
  if (!parsed.ok) {
    throw new ProcessingError(`Invalid element artifact ${inputPath}: ${parsed.reason}`, {
      stage,
      identity: record.identity
    });
  }
  return parsed.elements;
};

export class PartitionerStage implements ProcessingStage {
  readonly name = "partitioner";

  constructor(private readonly partitioner: DocumentPartitioner) {}

  async run(record: DocumentRecord, io: StageIO, ctx: StageContext): Promise<void> {
    const elements = await this.partitioner.partition({ record, filePath: io.inputPath, signal: ctx.signal });
    if (elements.length === 0) {
      ctx.logger.info("partition.empty", { identity: record.identity });
    }
    await writeJsonArtifact(io.outputPath, elements);
  }
}

export class ChunkerStage implements ProcessingStage {
  readonly name = "chunker";

  constructor(private readonly chunker: DocumentChunker) {}

  async run(record: DocumentRecord, io: StageIO, _ctx: StageContext): Promise<void> {
    const elements = await readElementsArtifact(io.inputPath, record, this.name);
    await writeJsonArtifact(io.outputPath, this.chunker.chunk(elements, record));
  }
}

export class EmbedderStage implements ProcessingStage {
  readonly name = "embedder";

  constructor(
    private readonly embedder: DocumentEmbedder,
    private readonly batchSize: number
  ) {}

  async run(record: DocumentRecord, io: StageIO, ctx: StageContext): Promise<void> {
    const elements = await readElementsArtifact(io.inputPath, record, this.name);
    const embedded: DocumentElement[] = [];

    for (let start = 0; start < elements.length; start += this.batchSize) {
      const batch = elements.slice(start, start + this.batchSize);
      const vectors = await this.embedder.embedDocuments(
        batch.map((element) => element.text),
        ctx.signal
      );
      if (vectors.length !== batch.length) {
        throw new ProcessingError(
          `Embedder ${this.embedder.model} returned ${vectors.length} vectors for ${batch.length} texts`,
          { stage: this.name, identity: record.identity }
        );
      }
      batch.forEach((element, index) => {
        embedded.push({ ...element, embeddings: vectors[index] });
      });
    }

    await writeJsonArtifact(io.outputPath, embedded);
  }
}

export class StagerStage implements ProcessingStage {
  readonly name = "stager";

  constructor(private readonly stager: UploadStager) {}

  async run(record: DocumentRecord, io: StageIO, _ctx: StageContext): Promise<void> {
    const elements = await readElementsArtifact(io.inputPath, record, this.name);
    await writeJsonArtifact(io.outputPath, this.stager.stage(elements, record));
  }
}
