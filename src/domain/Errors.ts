import { Data } from "effect";
import type { Snapshot } from "./Snapshot.js";

// Raised before any stepping: bad grid, domain, boundary selector or initial field.
export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
    readonly field: string;
    readonly message: string;
}> { }

export type InstabilityReason = "step-size" | "non-finite";

/**
 * The run stopped at `step`. `partial` holds every snapshot recorded before the
 * failure; it is never a complete sequence.
 */
export class NumericalInstabilityError extends Data.TaggedError("NumericalInstabilityError")<{
    readonly reason: InstabilityReason;
    readonly step: number;
    readonly time: number;
    readonly message: string;
    readonly partial: ReadonlyArray<Snapshot>;
}> { }

export type SolverError = ConfigurationError | NumericalInstabilityError;
