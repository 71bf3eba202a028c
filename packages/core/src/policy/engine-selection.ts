export type RequestedEngine = "auto" | "base_only" | "aligned";

export type DiarizeRequest = "on" | "off" | "auto";

/**
 * Result of looking for the aligned engine. `unknown` means the check could
 * not tell (e.g. a bare command name that may or may not be on PATH).
 */
export type RuntimeAvailability = "available" | "unavailable" | "unknown";

export interface EngineSelectionInput {
  requestedEngine: RequestedEngine;
  alignedRuntime: RuntimeAvailability;
  diarizeRequested: DiarizeRequest;
  hfTokenPresent: boolean;
}

export interface EngineSelection {
  useAligned: boolean;
  useDiarization: boolean;
  /** Whether an aligned-engine failure may fall back to approximation */
  fallbackOnFailure: boolean;
  reasons: string[];
}

function decideAligned(
  input: EngineSelectionInput,
  reasons: string[]
): boolean {
  switch (input.requestedEngine) {
    case "base_only":
      reasons.push("base engine only was requested");
      return false;
    case "aligned":
      if (input.alignedRuntime !== "available") {
        reasons.push(
          `aligned engine was requested explicitly (runtime ${input.alignedRuntime}); failures are fatal`
        );
      }
      return true;
    case "auto":
      if (input.alignedRuntime === "available") return true;
      if (input.alignedRuntime === "unknown") {
        reasons.push(
          "aligned runtime availability is unknown; attempting it with approximation as fallback"
        );
        return true;
      }
      reasons.push("aligned runtime unavailable; word timing will be approximated");
      return false;
  }
}

/**
 * Decides per run whether the word-aligned engine is attempted and whether
 * diarization is attached. Diarization data only arrives through the aligned
 * engine, so it is never selected without it.
 */
export function selectEngines(input: EngineSelectionInput): EngineSelection {
  const reasons: string[] = [];
  const useAligned = decideAligned(input, reasons);

  const wantsDiarization =
    input.diarizeRequested === "on" ||
    (input.diarizeRequested === "auto" && input.hfTokenPresent);
  const useDiarization = useAligned && wantsDiarization;

  if (wantsDiarization && !useAligned) {
    reasons.push("diarization skipped: it requires the aligned engine");
  } else if (input.diarizeRequested === "auto" && useAligned && !input.hfTokenPresent) {
    reasons.push("diarization skipped: no Hugging Face token present");
  }

  return {
    useAligned,
    useDiarization,
    fallbackOnFailure: input.requestedEngine !== "aligned",
    reasons,
  };
}
