/**
 * Persona Knowledge Graph Model
 *
 * Trait lifecycle, schema setup and the catalog of graph mutations used by
 * the PKG writer. Every mutation MERGEs on a stable key so it can be replayed.
 */

// =============================================================================
// TRAIT LIFECYCLE
// =============================================================================

export type TraitStatus =
  | 'candidate'
  | 'active'
  | 'active_user_confirmed'
  | 'active_user_modified'
  | 'rejected_by_user';

export type TraitOrigin =
  | 'ai_derived'
  | 'ai_confirmed_user'
  | 'ai_refined_user'
  | 'user_defined';

/**
 * Trait properties as returned after a user decision or a custom-trait write.
 */
export interface TraitNodeProperties {
  traitID: string;
  name: string | null;
  description: string | null;
  category: string | null;
  status: TraitStatus | null;
  origin: TraitOrigin | null;
  userConfidence: number | null;
  /** ISO-8601 */
  lastRefinedTimestamp: string | null;
}

export interface CommunicationStyleEntryProperties {
  userID: string;
  styleDimension: string;
  styleValue: string | number | boolean;
  /** ISO-8601 */
  lastUpdated: string;
}

// =============================================================================
// SCHEMA CREATION
// =============================================================================

export const SCHEMA_CREATION_QUERIES = {
  constraints: [
    `CREATE CONSTRAINT pkg_user_id_unique IF NOT EXISTS
     FOR (u:User) REQUIRE u.userID IS UNIQUE`,

    `CREATE CONSTRAINT pkg_trait_id_unique IF NOT EXISTS
     FOR (t:Trait) REQUIRE t.traitID IS UNIQUE`,

    `CREATE CONSTRAINT pkg_evidence_id_unique IF NOT EXISTS
     FOR (e:Evidence) REQUIRE e.evidenceID IS UNIQUE`,

    `CREATE CONSTRAINT pkg_concept_name_unique IF NOT EXISTS
     FOR (c:Concept) REQUIRE c.name IS UNIQUE`,

    `CREATE CONSTRAINT pkg_style_entry_unique IF NOT EXISTS
     FOR (s:CommunicationStyleEntry) REQUIRE (s.userID, s.styleDimension) IS UNIQUE`,
  ],

  indexes: [
    `CREATE INDEX pkg_trait_status IF NOT EXISTS
     FOR (t:Trait) ON (t.status)`,

    `CREATE INDEX pkg_trait_category IF NOT EXISTS
     FOR (t:Trait) ON (t.category)`,
  ],
} as const;

// =============================================================================
// GRAPH MUTATIONS
// =============================================================================

/**
 * A named, parameterized write. Parameters are bound by the PKG writer.
 */
export interface GraphMutation {
  readonly name: string;
  readonly cypher: string;
}

export const GRAPH_MUTATIONS = {
  // ==========================================================================
  // USER
  // ==========================================================================

  mergeUser: {
    name: 'mergeUser',
    cypher: `
      MERGE (u:User {userID: $userID})
      ON CREATE SET u.createdAt = datetime()
      RETURN u.userID AS userID
    `,
  },

  // ==========================================================================
  // AI-DERIVED TRAITS
  // ==========================================================================

  /** Status, origin and user-facing text survive once a user has decided. */
  mergeTraitCandidate: {
    name: 'mergeTraitCandidate',
    cypher: `
      MERGE (t:Trait {traitID: $traitID})
      ON CREATE SET
        t.name = $name,
        t.description = $description,
        t.category = $category,
        t.status = 'candidate',
        t.origin = 'ai_derived',
        t.aiConfidence = $confidence,
        t.originModels = $originModels,
        t.associatedFeatureSetIDs = $featureSetIDs,
        t.creationTimestamp = datetime(),
        t.lastUpdatedTimestamp = datetime()
      ON MATCH SET
        t.description = CASE WHEN t.status = 'candidate' THEN $description ELSE t.description END,
        t.aiConfidence = CASE
          WHEN $confidence > coalesce(t.aiConfidence, 0.0) THEN $confidence
          ELSE t.aiConfidence
        END,
        t.originModels = $originModels,
        t.associatedFeatureSetIDs = $featureSetIDs,
        t.lastUpdatedTimestamp = datetime()
      RETURN t.traitID AS traitID
    `,
  },

  mergeUserHasTraitCandidate: {
    name: 'mergeUserHasTraitCandidate',
    cypher: `
      MATCH (u:User {userID: $userID})
      MATCH (t:Trait {traitID: $traitID})
      MERGE (u)-[r:HAS_TRAIT]->(t)
      ON CREATE SET
        r.isActive = true,
        r.source = 'ai_derived',
        r.confidence = $confidence,
        r.createdAt = datetime()
      ON MATCH SET
        r.confidence = CASE
          WHEN $confidence > coalesce(r.confidence, 0.0) THEN $confidence
          ELSE r.confidence
        END
      RETURN type(r) AS relationship
    `,
  },

  // ==========================================================================
  // EVIDENCE
  // ==========================================================================

  mergeEvidence: {
    name: 'mergeEvidence',
    cypher: `
      MERGE (e:Evidence {evidenceID: $evidenceID})
      ON CREATE SET
        e.type = $type,
        e.content = $content,
        e.sourcePackageID = $sourcePackageID,
        e.sourceDetail = $sourceDetail,
        e.createdAt = datetime()
      RETURN e.evidenceID AS evidenceID
    `,
  },

  mergeTraitSupportedBy: {
    name: 'mergeTraitSupportedBy',
    cypher: `
      MATCH (t:Trait {traitID: $traitID})
      MATCH (e:Evidence {evidenceID: $evidenceID})
      MERGE (t)-[r:SUPPORTED_BY]->(e)
      SET r.relevanceScore = $relevanceScore
      RETURN type(r) AS relationship
    `,
  },

  // ==========================================================================
  // CONCEPTS
  // ==========================================================================

  mergeConcept: {
    name: 'mergeConcept',
    cypher: `
      MERGE (c:Concept {name: $name})
      ON CREATE SET
        c.displayName = $displayName,
        c.createdAt = datetime()
      RETURN c.name AS name
    `,
  },

  /** Frequency and sentiment are folded in once per source package. */
  mergeUserMentionsConcept: {
    name: 'mergeUserMentionsConcept',
    cypher: `
      MATCH (u:User {userID: $userID})
      MATCH (c:Concept {name: $name})
      MERGE (u)-[r:MENTIONS]->(c)
      ON CREATE SET
        r.frequency = 0,
        r.sourcePackageIDs = [],
        r.firstMentionedAt = datetime()
      WITH r, NOT ($packageID IN r.sourcePackageIDs) AS isNewSource
      SET
        r.avgSentiment = CASE
          WHEN NOT isNewSource OR $sentiment IS NULL THEN r.avgSentiment
          WHEN r.avgSentiment IS NULL THEN $sentiment
          ELSE (r.avgSentiment * r.frequency + $sentiment * $frequency) / (r.frequency + $frequency)
        END,
        r.frequency = CASE WHEN isNewSource THEN r.frequency + $frequency ELSE r.frequency END,
        r.sourcePackageIDs = CASE
          WHEN isNewSource THEN r.sourcePackageIDs + $packageID
          ELSE r.sourcePackageIDs
        END,
        r.lastMentionedAt = datetime()
      RETURN r.frequency AS frequency
    `,
  },

  // ==========================================================================
  // USER DECISIONS
  // ==========================================================================

  setTraitDecision: {
    name: 'setTraitDecision',
    cypher: `
      MERGE (t:Trait {traitID: $traitID})
      ON CREATE SET t.creationTimestamp = datetime()
      SET t += $properties,
        t.lastRefinedTimestamp = datetime($refinedAt)
      RETURN
        t.traitID AS traitID,
        t.name AS name,
        t.description AS description,
        t.category AS category,
        t.status AS status,
        t.origin AS origin,
        t.userConfidence AS userConfidence,
        toString(t.lastRefinedTimestamp) AS lastRefinedTimestamp
    `,
  },

  activateUserTrait: {
    name: 'activateUserTrait',
    cypher: `
      MATCH (u:User {userID: $userID})
      MATCH (t:Trait {traitID: $traitID})
      MERGE (u)-[r:HAS_TRAIT]->(t)
      ON CREATE SET r.createdAt = datetime()
      SET
        r.isActive = true,
        r.source = $origin,
        r.userConfidence = $userConfidence,
        r.lastConfirmedAt = datetime($refinedAt)
      RETURN type(r) AS relationship
    `,
  },

  deactivateUserTrait: {
    name: 'deactivateUserTrait',
    cypher: `
      MATCH (u:User {userID: $userID})
      MATCH (t:Trait {traitID: $traitID})
      MERGE (u)-[r:HAS_TRAIT]->(t)
      ON CREATE SET r.createdAt = datetime()
      SET
        r.isActive = false,
        r.rejectedAt = datetime($refinedAt)
      RETURN type(r) AS relationship
    `,
  },

  // ==========================================================================
  // USER-DEFINED TRAITS
  // ==========================================================================

  mergeCustomTrait: {
    name: 'mergeCustomTrait',
    cypher: `
      MERGE (t:Trait {traitID: $traitID})
      ON CREATE SET
        t.name = $name,
        t.description = $description,
        t.category = $category,
        t.status = 'active',
        t.origin = 'user_defined',
        t.userConfidence = $userConfidence,
        t.creationTimestamp = datetime($createdAt),
        t.lastRefinedTimestamp = datetime($createdAt)
      RETURN
        t.traitID AS traitID,
        t.name AS name,
        t.description AS description,
        t.category AS category,
        t.status AS status,
        t.origin AS origin,
        t.userConfidence AS userConfidence,
        toString(t.lastRefinedTimestamp) AS lastRefinedTimestamp
    `,
  },

  mergeUserHasCustomTrait: {
    name: 'mergeUserHasCustomTrait',
    cypher: `
      MATCH (u:User {userID: $userID})
      MATCH (t:Trait {traitID: $traitID})
      MERGE (u)-[r:HAS_TRAIT]->(t)
      ON CREATE SET r.createdAt = datetime()
      SET
        r.isActive = true,
        r.source = 'user_defined',
        r.strength = $strength
      RETURN type(r) AS relationship
    `,
  },

  // ==========================================================================
  // COMMUNICATION STYLE
  // ==========================================================================

  mergeStyleEntry: {
    name: 'mergeStyleEntry',
    cypher: `
      MERGE (s:CommunicationStyleEntry {userID: $userID, styleDimension: $styleDimension})
      SET
        s.styleValue = $styleValue,
        s.lastUpdated = datetime($updatedAt)
      RETURN
        s.userID AS userID,
        s.styleDimension AS styleDimension,
        s.styleValue AS styleValue,
        toString(s.lastUpdated) AS lastUpdated
    `,
  },

  mergeUserAdoptsStyle: {
    name: 'mergeUserAdoptsStyle',
    cypher: `
      MATCH (u:User {userID: $userID})
      MATCH (s:CommunicationStyleEntry {userID: $userID, styleDimension: $styleDimension})
      MERGE (u)-[r:ADOPTS_COMMUNICATION_STYLE]->(s)
      SET r.lastUpdated = datetime($updatedAt)
      RETURN type(r) AS relationship
    `,
  },
} as const satisfies Record<string, GraphMutation>;
