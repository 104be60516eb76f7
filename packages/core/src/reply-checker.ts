import type { CommentNode, Item, StreamSource } from "@maplink/types";

/** Reddit user names are case-insensitive. */
export const isSameAccount = (author: string | null, account: string): boolean =>
  author !== null && author.toLowerCase() === account.toLowerCase();

/**
 * Answers "has the bot already replied to this item" by re-reading the
 * thread from Reddit, which also sees replies made before a restart.
 */
export class ReplyChecker {
  constructor(
    private readonly source: Pick<StreamSource, "getSubmissionComments">,
    private readonly botName: string,
  ) {}

  async hasReplied(item: Item): Promise<boolean> {
    const replies = await this.repliesTo(item);
    return replies.some((reply) => isSameAccount(reply.author, this.botName));
  }

  private async repliesTo(item: Item): Promise<readonly CommentNode[]> {
    const thread = await this.source.getSubmissionComments(item.permalink);
    switch (item.kind) {
      case "comment":
        // a comment permalink puts that comment at the top of the tree
        return thread.find((node) => node.id === item.id)?.replies ?? [];
      case "submission":
        return thread;
    }
  }
}
