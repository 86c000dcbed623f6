import { InfrastructureError } from "@middleware/errorHandler";

/** Missing, unreadable or malformed model/vectorizer artifact. */
export class ArtifactError extends InfrastructureError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message, 500, metadata);
  }
}
