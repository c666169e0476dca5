import type { DocumentRecord } from "../../core/document/DocumentRecord";
import type { DocumentElement } from "../../core/processing/elements";
import type { ElementRow, UploadStager } from "../../ports/DestinationStore";

/**
 * Flattens elements into rows keyed by elementId, carrying the record's source
 * metadata so a stored element can be traced back to the file it came from.
 */
export class MongoElementStager implements UploadStager {
  stage(elements: DocumentElement[], record: DocumentRecord): ElementRow[] {
    return elements.map((element) => {
      const row: ElementRow = {
        elementId: element.elementId,
        recordId: record.identity,
        type: element.type,
        text: element.text,
        metadata: {
          ...element.metadata,
          relativePath: record.relativePath,
          source: { ...record.metadata }
        }
      };
      if (element.embeddings) row.embeddings = element.embeddings;
      return row;
    });
  }
}
