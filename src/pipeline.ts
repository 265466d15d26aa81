import type { Classifier } from "./classifier.js";
import { TransportError, toError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { MediaSource } from "./sink.js";

// Verdict is the binary decision the state machine sees; the raw classifier payload stays here.
export type Verdict =
  | { kind: "approved"; confidence: number; verifiedBy: string }
  | { kind: "needs_review"; confidence: number; reason: string }
  | { kind: "transport_error"; message: string };

type VerifyInput = {
  media: MediaSource;
  classifier: Classifier;
  logger: Logger;
  confidenceThreshold: number;
  mediaRef: string;
};

/**
 * Downloads the media and classifies it. Approval needs both the classifier's flag and
 * a confidence at or above the threshold. Download and classifier failures come back
 * as a transport error; callers must not mutate anything on that outcome.
 */
export const verifySubmission = async ({
  media,
  classifier,
  logger,
  confidenceThreshold,
  mediaRef,
}: VerifyInput): Promise<Verdict> => {
  try {
    const payload = await media.download(mediaRef);
    const classification = await classifier.classify(payload.bytes, payload.content_type);
    logger.debug("Classified submission", {
      mediaRef,
      approved: classification.approved,
      confidence: classification.confidence,
    });

    if (classification.approved && classification.confidence >= confidenceThreshold) {
      return { kind: "approved", confidence: classification.confidence, verifiedBy: classifier.id };
    }
    return {
      kind: "needs_review",
      confidence: classification.confidence,
      reason: classification.reason || (classification.approved ? "low confidence" : "not approved"),
    };
  } catch (error) {
    if (error instanceof TransportError) {
      logger.warn(`Verification unavailable: ${error.message}`, { mediaRef });
      return { kind: "transport_error", message: error.message };
    }
    throw toError(error);
  }
};
