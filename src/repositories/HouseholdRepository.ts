/**
 * Household Directory
 *
 * Guardian → child review authority, mirrored from the account service into
 * household_guardians. Read-only here.
 */

import type { QueryFn } from '../db';
import type { HouseholdDirectory } from '../types';

export class PgHouseholdDirectory implements HouseholdDirectory {
  constructor(private readonly query: QueryFn) {}

  async canReview(reviewerId: string, childId: string): Promise<boolean> {
    const result = await this.query<{ exists: boolean }>(
      `SELECT EXISTS(
         SELECT 1 FROM household_guardians WHERE guardian_id = $1 AND child_id = $2
       ) as exists`,
      [reviewerId, childId]
    );
    return result.rows[0]?.exists ?? false;
  }

  async childrenOf(reviewerId: string): Promise<string[]> {
    const result = await this.query<{ child_id: string }>(
      'SELECT child_id FROM household_guardians WHERE guardian_id = $1 ORDER BY child_id',
      [reviewerId]
    );
    return result.rows.map(row => row.child_id);
  }
}
