/**
 * Error handling for ATAC-seq data access
 *
 * Every failure surfaces to the immediate caller: nothing here is retried
 * or recovered. The hierarchy lets callers tell parse failures, I/O
 * failures and paired-read desynchronization apart.
 */

/**
 * Base error class for all atacseq-io errors
 */
export class AtacSeqError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "AtacSeqError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed options or records
 */
export class ValidationError extends AtacSeqError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends AtacSeqError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * BED format-specific errors
 */
export class BedError extends ParseError {
  constructor(
    message: string,
    public readonly reference?: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "BED", lineNumber, context);
    this.name = "BedError";
  }
}

/**
 * Nucleotide sequence errors
 */
export class SequenceError extends ValidationError {
  constructor(
    message: string,
    public readonly position?: number,
    context?: string
  ) {
    super(message, undefined, context);
    this.name = "SequenceError";
  }
}

/**
 * Compression/decompression errors with detailed context
 */
export class CompressionError extends AtacSeqError {
  constructor(
    message: string,
    public readonly format: "gzip" | "none",
    public readonly operation: "detect" | "decompress" | "stream",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  /**
   * Create compression error from system error
   */
  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = CompressionError.getSuggestionForCompressionError(format, errorMessage);

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      format,
      operation,
      bytesProcessed,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForCompressionError(
    format: CompressionError["format"],
    errorMessage: string
  ): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("magic") || msg.includes("header")) {
      return `File may be corrupted or not actually ${format} compressed`;
    }
    if (msg.includes("eof") || msg.includes("truncated") || msg.includes("unexpected end")) {
      return "File appears to be truncated or incomplete";
    }
    if (msg.includes("crc") || msg.includes("checksum")) {
      return "Data integrity check failed - file may be corrupted";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.bytesProcessed !== undefined) {
      msg += `\nBytes processed: ${this.bytesProcessed}`;
    }

    return msg;
  }
}

/**
 * File I/O errors carrying the failing path and the underlying system error
 */
export class FileError extends AtacSeqError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "stat" | "open",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed for '${filePath}': ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("emfile") || msg.includes("too many open files")) {
      return "Close unused file handles or increase system limits";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }

    return msg;
  }
}

/**
 * Stream processing errors for line-oriented reads
 */
export class StreamError extends AtacSeqError {
  constructor(
    message: string,
    public readonly streamType: "read" | "transform",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}

/**
 * Paired-end synchronization errors, raised only when pair checking is enabled
 */
export class PairSyncError extends ParseError {
  constructor(
    message: string,
    public readonly pairIndex: number,
    public readonly failedFile: "r1" | "r2" | "both"
  ) {
    super(message, "FASTQ-Paired");
    this.name = "PairSyncError";
  }

  /**
   * Create error for read ID mismatch
   */
  static forIdMismatch(
    r1Id: string,
    r2Id: string,
    pairIndex: number,
    baseR1: string,
    baseR2: string
  ): PairSyncError {
    return new PairSyncError(
      `Read ID mismatch at pair ${pairIndex}: R1="${r1Id}" vs R2="${r2Id}" (base IDs: "${baseR1}" vs "${baseR2}")`,
      pairIndex,
      "both"
    );
  }

  /**
   * Create error for file length mismatch
   */
  static forLengthMismatch(pairIndex: number, exhaustedFile: "r1" | "r2"): PairSyncError {
    const exhausted = exhaustedFile === "r1" ? "R1" : "R2";
    const other = exhaustedFile === "r1" ? "R2" : "R1";

    return new PairSyncError(
      `Paired FASTQ files have different lengths: ${exhausted} exhausted first at pair ${pairIndex}. ${other} file has more reads.`,
      pairIndex,
      exhaustedFile
    );
  }

  /**
   * Create error for a record cut short by end of file
   */
  static forPartialRecord(
    pairIndex: number,
    file: "r1" | "r2",
    linesRead: number
  ): PairSyncError {
    return new PairSyncError(
      `Incomplete FASTQ record in ${file.toUpperCase()} at pair ${pairIndex}: expected 4 lines, found ${linesRead}`,
      pairIndex,
      file
    );
  }

  override toString(): string {
    let msg = super.toString();
    msg += `\nPair Index: ${this.pairIndex}`;
    msg += `\nFailed File(s): ${this.failedFile === "both" ? "R1 and R2" : this.failedFile.toUpperCase()}`;
    return msg;
  }
}
