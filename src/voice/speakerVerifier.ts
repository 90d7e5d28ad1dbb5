import { EnrollmentMissingError, SpeakerMismatchError } from '../errors';
import { createLogger, type Logger } from '../log';
import type { AudioFrame } from '../wake/types';
import { cosineSimilarity, type Embedding, type EmbeddingModel } from './embedding';
import type { VoiceprintStore } from './voiceprintStore';

export const DEFAULT_VERIFICATION_THRESHOLD = 0.8;

/**
 * Subset of the store the verifier relies on, so tests and alternative stores can stand in.
 */
export type VoiceprintRepository = Pick<VoiceprintStore, 'save' | 'load' | 'exists' | 'path'>;

export class SpeakerVerifier {
  constructor(
    private readonly embeddingModel: EmbeddingModel,
    private readonly store: VoiceprintRepository,
    public threshold = DEFAULT_VERIFICATION_THRESHOLD,
    private readonly logger: Logger = createLogger('SpeakerVerifier'),
  ) {}

  /**
   * Compute the owner's embedding and persist it, replacing any previous enrollment.
   */
  async enrollOwner(frames: readonly AudioFrame[], sampleRate: number): Promise<Embedding> {
    const embedding = await this.embeddingModel.embed(frames, sampleRate);
    await this.store.save(embedding);
    this.logger.info(`Enrolled owner from ${frames.length} frames (embedding length ${embedding.length})`);
    return embedding;
  }

  /**
   * Resolves with the similarity score when the speaker matches the enrolled owner.
   */
  async verifyOwner(frames: readonly AudioFrame[], sampleRate: number): Promise<number> {
    if (!this.store.exists()) {
      throw new EnrollmentMissingError(this.store.path);
    }

    const owner = await this.store.load();
    const candidate = await this.embeddingModel.embed(frames, sampleRate);
    const similarity = cosineSimilarity(owner, candidate);

    this.logger.debug(`Similarity ${similarity.toFixed(4)} (threshold ${this.threshold})`);
    if (similarity < this.threshold) {
      throw new SpeakerMismatchError(similarity, this.threshold);
    }
    return similarity;
  }
}
