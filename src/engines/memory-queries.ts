/**
 * @file engines/memory-queries
 * @description Cypher statements used by the search engines and memory tools.
 * @remarks Infrastructure label filters are passed as `$excludedLabels` so the
 * list stays configurable.
 */

/** Summary columns shared by every `ConversationSession` query. */
const SESSION_COLUMNS = `RETURN s.conversation_id AS conversationId,
       s.first_message_at AS firstMessageAt,
       s.last_message_at AS lastMessageAt,
       s.message_count AS messageCount,
       s.entity_count AS entityCount,
       s.chunk_count AS chunkCount,
       s.importance_score AS importanceScore`;

export const MEMORY_QUERIES = {
  /** Case-insensitive name or alias match; canonical-name matches win. */
  findEntity: `
MATCH (e:Entity)
WHERE toLower(e.name) = $nameLower
   OR any(alias IN coalesce(e.aliases, []) WHERE toLower(alias) = $nameLower)
RETURN e.name AS name,
       e.entityType AS entityType,
       coalesce(e.aliases, []) AS aliases,
       labels(e) AS labels
ORDER BY CASE WHEN toLower(e.name) = $nameLower THEN 0 ELSE 1 END, e.name
LIMIT 1`,

  suggestEntities: `
MATCH (e:Entity)
WHERE toLower(e.name) CONTAINS $fragment
   OR any(alias IN coalesce(e.aliases, []) WHERE toLower(alias) CONTAINS $fragment)
RETURN DISTINCT e.name AS name
ORDER BY name
LIMIT $limit`,

  oneHopNeighbors: `
MATCH (center:Entity {name: $name})-[r]-(neighbor:Entity)
WHERE NOT any(label IN labels(neighbor) WHERE label IN $excludedLabels)
RETURN neighbor.name AS name,
       neighbor.entityType AS entityType,
       type(r) AS relationshipType,
       CASE WHEN startNode(r) = center THEN 'outgoing' ELSE 'incoming' END AS direction
LIMIT $limit`,

  twoHopNeighbors: `
MATCH (center:Entity {name: $name})-[r1]-(intermediate:Entity)-[r2]-(outer:Entity)
WHERE NOT any(label IN labels(intermediate) WHERE label IN $excludedLabels)
  AND NOT any(label IN labels(outer) WHERE label IN $excludedLabels)
  AND outer <> center
  AND NOT (center)-[]-(outer)
RETURN outer.name AS name,
       outer.entityType AS entityType,
       intermediate.name AS viaEntity,
       type(r1) AS firstRelationship,
       type(r2) AS secondRelationship
LIMIT $limit`,

  /** Newest first per entity; per-entity caps are applied by the caller. */
  entityObservations: `
UNWIND $names AS entityName
MATCH (e:Entity {name: entityName})-[:ENTITY_HAS_OBSERVATION]->(obs:Observation)
RETURN entityName,
       obs.content AS content,
       obs.created_at AS createdAt,
       obs.semantic_theme AS theme,
       obs.importance_score AS importance
ORDER BY entityName, obs.created_at DESC`,

  entitiesByName: `
UNWIND range(0, size($names) - 1) AS position
WITH position, $names[position] AS requested
MATCH (e:Entity)
WHERE e.name = requested OR requested IN coalesce(e.aliases, [])
WITH position, requested, e
ORDER BY position, CASE WHEN e.name = requested THEN 0 ELSE 1 END, e.name
WITH position, requested, collect(e)[0] AS e
RETURN requested, labels(e) AS labels, properties(e) AS properties
ORDER BY position`,

  entityTextSearch: `
MATCH (e:Entity)
WHERE toLower(e.name) CONTAINS $text
   OR any(alias IN coalesce(e.aliases, []) WHERE toLower(alias) CONTAINS $text)
   OR any(obs IN coalesce(e.observations, []) WHERE toLower(toString(obs)) CONTAINS $text)
RETURN labels(e) AS labels, properties(e) AS properties
ORDER BY e.name
LIMIT $limit`,

  /** Concept links below `$confidenceMin` are left out of `linkedConcepts`. */
  searchObservations: `
MATCH (owner:Entity)-[:ENTITY_HAS_OBSERVATION]->(o:Observation)
WHERE o.content IS NOT NULL
  AND ($entityName IS NULL OR owner.name = $entityName)
  AND ($theme IS NULL OR o.semantic_theme = $theme)
  AND ($text IS NULL OR toLower(o.content) CONTAINS $text)
OPTIONAL MATCH (o)-[:OCCURRED_ON]->(day:Day)
WITH owner, o, day
WHERE ($startDate IS NULL OR (day IS NOT NULL AND day.date >= date($startDate)))
  AND ($endDate IS NULL OR (day IS NOT NULL AND day.date <= date($endDate)))
OPTIONAL MATCH (o)-[link:OBSERVATION_MENTIONS_CONCEPT]->(concept:Entity)
WHERE link.confidence >= $confidenceMin
WITH owner, o, day,
     collect(CASE WHEN concept IS NULL THEN null
                  ELSE {entity: concept.name, confidence: link.confidence} END) AS linkedConcepts
RETURN owner.name AS entityName,
       o.content AS content,
       o.semantic_theme AS theme,
       o.importance_score AS importance,
       o.created_at AS createdAt,
       day.date AS occurredOn,
       linkedConcepts
ORDER BY o.created_at DESC
SKIP $offset
LIMIT $limit`,

  searchConversations: `
MATCH (s:ConversationSession)
WHERE ($topic IS NULL OR EXISTS {
        MATCH (s)-[:HAS_CHUNK]->(chunk:Chunk)
        WHERE toLower(chunk.content) CONTAINS $topic
      })
  AND ($startDate IS NULL OR s.first_message_at >= datetime($startDate))
  AND ($endDate IS NULL OR s.first_message_at < datetime($endDate) + duration({days: 1}))
  AND ($minMessages IS NULL OR s.message_count >= $minMessages)
${SESSION_COLUMNS}
ORDER BY s.importance_score DESC
LIMIT $limit`,

  /** Sessions linked by CONVERSATION_CREATED_ENTITY, most recent link first. */
  entityOrigins: `
MATCH (entity:Entity {name: $entityName})<-[r:CONVERSATION_CREATED_ENTITY]-(s:ConversationSession)
${SESSION_COLUMNS},
       r.created_at AS createdAt,
       r.confidence AS confidence,
       r.creation_method AS creationMethod
ORDER BY r.created_at DESC`,

  temporalContext: `
WITH datetime($date) AS center, duration({days: $windowDays}) AS window
MATCH (s:ConversationSession)
WHERE s.first_message_at >= center - window
  AND s.first_message_at <= center + window
${SESSION_COLUMNS}
ORDER BY s.first_message_at ASC
LIMIT $limit`,

  breakthroughSessions: `
MATCH (s:ConversationSession)
WHERE s.importance_score >= $minImportance
${SESSION_COLUMNS}
ORDER BY s.importance_score DESC
LIMIT $limit`,

  graphStatistics: `
RETURN COUNT { MATCH (:Entity) } AS entities,
       COUNT { MATCH ()-[]->() } AS relationships,
       COUNT { MATCH (:Observation) } AS observations,
       COUNT { MATCH (:CommunitySummary) } AS communities,
       COUNT { MATCH (:ConversationSession) } AS conversationSessions,
       COUNT { MATCH (:Chunk) } AS chunks`,
} as const;

export type MemoryQueryName = keyof typeof MEMORY_QUERIES;
