/**
 * Message domain model - one inbound message, written once and never updated
 */
export class Message {
  constructor(
    public readonly messageId: string,
    public readonly from: string,
    public readonly to: string,
    /**
     * Event time, normalized to `YYYY-MM-DDTHH:mm:ss.sssZ`
     */
    public readonly ts: string,
    public readonly text: string | null,
    /**
     * Server ingestion time (UTC ISO string)
     */
    public readonly createdAt: string,
  ) {}

  /**
   * Check whether the message text contains a term, ignoring case
   */
  mentions(term: string): boolean {
    if (this.text === null) {
      return false;
    }
    return this.text.toLowerCase().includes(term.toLowerCase());
  }
}
