import type { Logger, ResourceReference } from "@maplink/types";
import type { BlockFormatter } from "./beatmap-formatter.js";
import { uniqueReferences } from "./extract.js";
import { silentLogger } from "./logger.js";

export const LINE_BREAK = "\n\n";
/** Reddit's comment size limit. */
export const DEFAULT_MAX_REPLY_LENGTH = 10_000;

export interface ComposerOptions {
  readonly header: string;
  readonly footer: string;
  /** Literal `\n` sequences become newlines. */
  readonly sep?: string;
  readonly maxLength?: number;
  readonly logger?: Logger;
}

export interface ComposedReply {
  readonly text: string;
  readonly included: number;
  readonly dropped: number;
}

export class CommentComposer {
  private readonly sep: string;
  private readonly maxLength: number;
  private readonly logger: Logger;

  constructor(
    private readonly formatter: BlockFormatter,
    private readonly options: ComposerOptions,
  ) {
    this.sep = options.sep === undefined ? LINE_BREAK : options.sep.replaceAll("\\n", "\n");
    this.maxLength = options.maxLength ?? DEFAULT_MAX_REPLY_LENGTH;
    this.logger = options.logger ?? silentLogger;
  }

  async compose(references: readonly ResourceReference[]): Promise<ComposedReply> {
    const { header, footer } = this.options;
    const unique = uniqueReferences(references);
    const baseLength = header.length + footer.length + LINE_BREAK.length * 2;

    // each block is charged one separator, the first one included
    let budget = this.maxLength - baseLength;
    let body = "";
    let included = 0;
    for (const ref of unique) {
      const block = await this.formatter.format(ref);
      const cost = block.length + this.sep.length;
      if (cost > budget) {
        this.logger.warn("reply_truncated", {
          references: references.length,
          unique: unique.length,
          included,
          maxLength: this.maxLength,
        });
        break;
      }
      if (included > 0) {
        body += this.sep;
      }
      body += block;
      budget -= cost;
      included += 1;
    }

    return {
      text: `${header}${LINE_BREAK}${body}${LINE_BREAK}${footer}`,
      included,
      dropped: unique.length - included,
    };
  }
}
