// src/world/errors.ts

export type WorldMapPhase = "io" | "format" | "consistency";

/** Base for every error a world map load or save reports to its caller. */
export abstract class WorldMapError extends Error {
  public abstract readonly phase: WorldMapPhase;
}

export class WorldMapFormatError extends WorldMapError {
  public readonly phase = "format";
  public readonly line: number | undefined;

  public constructor(message: string, line?: number) {
    super(line === undefined ? message : `line ${line}: ${message}`);
    this.name = "WorldMapFormatError";
    this.line = line;
  }
}

export class UnknownBlockTypeError extends WorldMapFormatError {
  public constructor(public readonly token: string) {
    super(`Unknown block type '${token}'`);
    this.name = "UnknownBlockTypeError";
  }
}

export class WorldMapInconsistentError extends WorldMapError {
  public readonly phase = "consistency";

  public constructor(message: string) {
    super(message);
    this.name = "WorldMapInconsistentError";
  }
}

export class WorldMapIoError extends WorldMapError {
  public readonly phase = "io";

  public constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "WorldMapIoError";
  }
}

// Block-world rule violations raised by tiles and builders.

export class BlockWorldError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "BlockWorldError";
  }
}

export class TooHighError extends BlockWorldError {
  public constructor(message = "Too high") {
    super(message);
    this.name = "TooHighError";
  }
}

export class TooLowError extends BlockWorldError {
  public constructor(message = "Too low") {
    super(message);
    this.name = "TooLowError";
  }
}

export class InvalidBlockError extends BlockWorldError {
  public constructor(message = "Cannot use that block") {
    super(message);
    this.name = "InvalidBlockError";
  }
}

export class NoExitError extends BlockWorldError {
  public constructor(message = "No exit this way") {
    super(message);
    this.name = "NoExitError";
  }
}

export class ActionFormatError extends Error {
  public readonly line: number | undefined;

  public constructor(message: string, line?: number) {
    super(line === undefined ? message : `action line ${line}: ${message}`);
    this.name = "ActionFormatError";
    this.line = line;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
