import type {
  JMAPSession,
  JMAPRequest,
  JMAPResponse,
  JMAPMethodCall,
  Email,
  JMAPMailbox,
  EmailQueryFilter,
} from "./types.js";

export const MAIL_CAPABILITY = "urn:ietf:params:jmap:mail";

export class JMAPClient {
  private session: JMAPSession | null = null;
  private accountId: string | null = null;

  constructor(
    private readonly sessionUrl: string,
    private readonly token: string
  ) {}

  private async fetch<T>(
    url: string,
    options: RequestInit = {}
  ): Promise<T> {
    const response = await fetch(url, {
      ...options,
      headers: {
        Authorization: `Bearer ${this.token}`,
        "Content-Type": "application/json",
        ...options.headers,
      },
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`JMAP request failed: ${response.status} ${text}`);
    }

    return response.json() as Promise<T>;
  }

  async connect(): Promise<void> {
    this.session = await this.fetch<JMAPSession>(this.sessionUrl);

    this.accountId = this.session.primaryAccounts[MAIL_CAPABILITY] ?? null;
    if (!this.accountId) {
      throw new Error("No mail account found in JMAP session");
    }

    console.log(`[jmap] Connected as ${this.session.username}`);
  }

  get connected(): boolean {
    return this.session !== null && this.accountId !== null;
  }

  get username(): string | null {
    return this.session?.username ?? null;
  }

  private async call<T>(method: string, args: Record<string, unknown>): Promise<T> {
    if (!this.session) {
      throw new Error("Not connected. Call connect() first.");
    }

    const methodCalls: JMAPMethodCall[] = [
      [method, { accountId: this.accountId, ...args }, "0"],
    ];
    const request: JMAPRequest = {
      using: ["urn:ietf:params:jmap:core", MAIL_CAPABILITY],
      methodCalls,
    };

    const response = await this.fetch<JMAPResponse>(this.session.apiUrl, {
      method: "POST",
      body: JSON.stringify(request),
    });

    const result = response.methodResponses[0];
    if (!result) {
      throw new Error(`${method} returned no response`);
    }
    if (result[0] === "error") {
      throw new Error(`${method} failed: ${JSON.stringify(result[1])}`);
    }

    return result[1] as T;
  }

  // ============ Mailbox Operations ============

  async getMailboxes(): Promise<JMAPMailbox[]> {
    const result = await this.call<{ list: JMAPMailbox[] }>("Mailbox/get", {});
    return result.list;
  }

  async findMailboxByRole(role: string): Promise<JMAPMailbox | undefined> {
    const mailboxes = await this.getMailboxes();
    return mailboxes.find((m) => m.role === role);
  }

  async findMailboxByName(name: string): Promise<JMAPMailbox | undefined> {
    const mailboxes = await this.getMailboxes();
    return mailboxes.find((m) => m.name.toLowerCase() === name.toLowerCase());
  }

  async createMailbox(name: string, parentId?: string): Promise<JMAPMailbox> {
    const result = await this.call<{ created?: Record<string, JMAPMailbox> }>(
      "Mailbox/set",
      {
        create: {
          new: {
            name,
            parentId: parentId ?? null,
          },
        },
      }
    );

    const created = result.created?.new;
    if (!created) {
      throw new Error(`Failed to create mailbox ${name}`);
    }

    // Mailbox/set returns only server-set properties for a new mailbox.
    return { ...created, name, parentId: parentId ?? null };
  }

  // ============ Email Query Operations ============

  async queryEmails(
    filter: EmailQueryFilter,
    options: { limit?: number; position?: number; sort?: Array<{ property: string; isAscending?: boolean }> } = {}
  ): Promise<string[]> {
    const result = await this.call<{ ids: string[] }>("Email/query", {
      filter,
      sort: options.sort ?? [{ property: "receivedAt", isAscending: false }],
      limit: options.limit ?? 50,
      position: options.position ?? 0,
    });
    return result.ids;
  }

  async getEmails(
    ids: string[],
    properties?: string[]
  ): Promise<Email[]> {
    if (ids.length === 0) return [];

    const defaultProperties = [
      "id",
      "threadId",
      "mailboxIds",
      "keywords",
      "receivedAt",
      "from",
      "subject",
      "preview",
    ];

    const result = await this.call<{ list: Email[] }>("Email/get", {
      ids,
      properties: properties ?? defaultProperties,
    });
    return result.list;
  }

  // ============ Email Modification Operations ============

  private async updateEmail(
    emailId: string,
    patch: Record<string, unknown>
  ): Promise<void> {
    const result = await this.call<{ notUpdated?: Record<string, unknown> }>(
      "Email/set",
      { update: { [emailId]: patch } }
    );

    const failure = result.notUpdated?.[emailId];
    if (failure) {
      throw new Error(`Failed to update email ${emailId}: ${JSON.stringify(failure)}`);
    }
  }

  async addEmailKeyword(emailId: string, keyword: string): Promise<void> {
    await this.updateEmail(emailId, { [`keywords/${keyword}`]: true });
  }

  async removeEmailKeyword(emailId: string, keyword: string): Promise<void> {
    await this.updateEmail(emailId, { [`keywords/${keyword}`]: null });
  }

  async addEmailToMailbox(emailId: string, mailboxId: string): Promise<void> {
    // Adds without leaving other mailboxes, so mailboxes act as labels
    await this.updateEmail(emailId, { [`mailboxIds/${mailboxId}`]: true });
  }

  async removeEmailFromMailbox(emailId: string, mailboxId: string): Promise<void> {
    await this.updateEmail(emailId, { [`mailboxIds/${mailboxId}`]: null });
  }
}
