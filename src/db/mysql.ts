import mysql, { type Pool, type RowDataPacket } from "mysql2/promise";
import type { AppConfig } from "../config/index.js";
import type { ConceptRecord, ConceptStore } from "../terminology/types.js";
import { pickTranslation } from "../terminology/concept-store.js";

export function createPool(config: AppConfig): Pool {
  return mysql.createPool({
    host: config.mysql.host,
    port: config.mysql.port,
    user: config.mysql.user,
    password: config.mysql.password,
    database: config.mysql.database,
    connectionLimit: 10,
    waitForConnections: true,
    queueLimit: 0
  });
}

interface ConceptRow extends RowDataPacket {
  code: string;
  code_system: string;
  status: string;
  display: string;
  value_set_oid: string | null;
}

interface TranslationRow extends RowDataPacket {
  language_code: string;
  country_code: string | null;
  translated_display: string;
}

const CONCEPT_COLUMNS = `
  c.code,
  c.code_system,
  c.status,
  c.display,
  vs.oid AS value_set_oid
`;

function toConceptRecord(row: ConceptRow): ConceptRecord {
  return {
    code: row.code,
    codeSystemOid: row.code_system,
    status: row.status === "active" ? "active" : "inactive",
    defaultDisplay: row.display,
    valueSetOid: row.value_set_oid,
  };
}

/**
 * Read-only access to the catalogue tables maintained by the external
 * import process (value_set_catalogue, value_set_concept, concept_translation).
 */
export class MySqlConceptStore implements ConceptStore {
  constructor(private readonly pool: Pool) {}

  async findConcept(code: string, codeSystemOid: string): Promise<ConceptRecord | null> {
    const sql = `
      SELECT ${CONCEPT_COLUMNS}
      FROM \`value_set_concept\` c
      LEFT JOIN \`value_set_catalogue\` vs ON c.value_set_id = vs.id
      WHERE c.code = ? AND c.code_system = ? AND c.status = 'active'
      ORDER BY c.sort_order, c.id
      LIMIT 1
    `;
    const [rows] = await this.pool.query<ConceptRow[]>(sql, [code, codeSystemOid]);
    const first = rows[0];
    return first ? toConceptRecord(first) : null;
  }

  async findConceptByValueSet(code: string, valueSetOid: string): Promise<ConceptRecord | null> {
    const sql = `
      SELECT ${CONCEPT_COLUMNS}
      FROM \`value_set_concept\` c
      INNER JOIN \`value_set_catalogue\` vs ON c.value_set_id = vs.id
      WHERE c.code = ? AND vs.oid = ? AND c.status = 'active'
      ORDER BY c.sort_order, c.id
      LIMIT 1
    `;
    const [rows] = await this.pool.query<ConceptRow[]>(sql, [code, valueSetOid]);
    const first = rows[0];
    return first ? toConceptRecord(first) : null;
  }

  async findTranslation(concept: ConceptRecord, language: string, country?: string | null): Promise<string | null> {
    const sql = `
      SELECT t.language_code, t.country_code, t.translated_display
      FROM \`concept_translation\` t
      INNER JOIN \`value_set_concept\` c ON t.concept_id = c.id
      WHERE c.code = ? AND c.code_system = ? AND LOWER(t.language_code) = ?
    `;
    const [rows] = await this.pool.query<TranslationRow[]>(sql, [
      concept.code,
      concept.codeSystemOid,
      language.toLowerCase(),
    ]);
    return pickTranslation(
      rows.map((row) => ({
        language: row.language_code.toLowerCase(),
        country: row.country_code ? row.country_code.toUpperCase() : null,
        translatedDisplay: row.translated_display,
      })),
      language,
      country ?? null
    );
  }
}
