/**
 * Test Helpers
 *
 * Document texts and in-process stand-ins shared by the test suites.
 */

import type { CaseData, CaseDocument } from '@tenantcase/shared';
import type { CaseRepository, SnapshotBuilder, StoredDocument } from '../../services/worker-case-builder/src/lib/db';

export const LEASE_TEXT = `RESIDENTIAL LEASE AGREEMENT

LANDLORD: Maple Grove Properties LLC
TENANT: Jordan Rivera
PROPERTY: 123 Main Street, Apt 4B, Minneapolis, MN 55401

MONTHLY RENT: $1,250.00 due on the first day of each month.
SECURITY DEPOSIT: $1,250.00 paid at signing.
The term of this lease begins January 1, 2025 and ends December 31, 2025.`;

export const SUMMONS_TEXT = `STATE OF MINNESOTA                     DISTRICT COURT
COUNTY OF HENNEPIN                     FOURTH JUDICIAL DISTRICT

Court File No. 27-CV-25-3456

Lakeside Apartments LLC,
Plaintiff,
vs.
Taylor Morgan,
Defendant.

EVICTION SUMMONS

THE STATE OF MINNESOTA TO THE ABOVE-NAMED DEFENDANT:
You are hereby summoned to appear at a hearing on March 14, 2025 at 9:00 a.m.
The plaintiff claims unpaid rent of $1,800.00 under Minn. Stat. 504B.291.
Premises: 456 Oak Avenue, Unit 12, Minneapolis, MN 55404`;

export const NOTICE_TO_QUIT_TEXT = `NOTICE TO QUIT

To: Jordan Rivera
You are hereby notified that you must pay rent or quit the premises within 14 days.
Amount Due: $2,400.00`;

export const WRIT_TEXT = `STATE OF MINNESOTA                     DISTRICT COURT
COUNTY OF DAKOTA                       FIRST JUDICIAL DISTRICT

Court File No. 19HA-CV-25-1234

WRIT OF RESTITUTION

The sheriff shall remove the defendant from the premises.`;

/** 2025-03-01T12:00:00Z, the reference day used across suites */
export const REFERENCE_TIME = Date.UTC(2025, 2, 1, 12);
export const REFERENCE_DATE = new Date(REFERENCE_TIME);

/**
 * CaseRepository kept in memory. Documents are listed by upload time, then
 * document id, and a failing snapshot build leaves nothing written.
 */
export class InMemoryCaseRepository implements CaseRepository {
  private readonly documents = new Map<string, StoredDocument>();
  private readonly snapshots = new Map<string, CaseData>();

  async listDocuments(userId: string): Promise<CaseDocument[]> {
    return this.storedFor(userId).map((stored) => stored.document);
  }

  async saveDocumentAndSnapshot(stored: StoredDocument, buildSnapshot: SnapshotBuilder): Promise<CaseData> {
    const key = `${stored.user_id}/${stored.document.document_id}`;
    const previous = this.documents.get(key);
    this.documents.set(key, stored);

    try {
      const snapshot = buildSnapshot(await this.listDocuments(stored.user_id));
      this.snapshots.set(stored.user_id, snapshot);
      return snapshot;
    } catch (error) {
      if (previous) {
        this.documents.set(key, previous);
      } else {
        this.documents.delete(key);
      }
      throw error;
    }
  }

  async getSnapshot(userId: string): Promise<CaseData | null> {
    return this.snapshots.get(userId) ?? null;
  }

  get documentCount(): number {
    return this.documents.size;
  }

  private storedFor(userId: string): StoredDocument[] {
    return Array.from(this.documents.values())
      .filter((stored) => stored.user_id === userId)
      .sort(
        (a, b) =>
          a.uploaded_at.localeCompare(b.uploaded_at) || a.document.document_id.localeCompare(b.document.document_id)
      );
  }
}
