/**
 * Candidate type definitions
 *
 * Bullets are the pre-written resume statements the engine ranks.
 * They are owned by the caller and passed in by value; the engine never
 * mutates a record, it only wraps it in scored result objects.
 */

/**
 * A single pre-written resume bullet.
 */
export type BulletRecord = {
  /** Display text of the bullet */
  bullet: string;
  /** Estimated physical line cost on the rendered page */
  lines: number;
  /** Role (position) this bullet belongs to */
  role?: string;
  /** Optional source category tag */
  category?: string | null;
  /** Optional keyword tags */
  keywords?: string[];
};

/**
 * Bullet pool grouped by role name, in the caller's original order.
 */
export type BulletPool = Record<string, BulletRecord[]>;

/**
 * Intermediate ranking entry shared by the retrieval and re-ranking stages.
 *
 * `index` is the candidate's position in the list handed to the first stage.
 * It is carried through every stage so that results map back to their records
 * without relying on text equality.
 */
export type RankedCandidate = {
  index: number;
  text: string;
  score: number;
};

/**
 * Retrieval result before re-ranking (raw cosine similarity).
 */
export type RetrievedCandidate = {
  index: number;
  text: string;
  similarity: number;
};

/**
 * Final bullet recommendation entry.
 */
export type ScoredBullet = {
  bullet: BulletRecord;
  /** Integer score; higher is more relevant */
  score: number;
  /** Job phrases most similar to this bullet (evidence only) */
  matches: string[];
};

/**
 * Bullet recommendation without evidence phrases.
 */
export type ScoredBulletSummary = Omit<ScoredBullet, "matches">;
