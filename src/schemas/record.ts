/**
 * Stored Record Schema
 *
 * One JSON document per ingested API response: a provenance envelope
 * (`metadados`) and the raw payload (`dados`). Key names are part of the
 * on-disk format and stay in Portuguese.
 */

import { z } from 'zod';
import {
  BusinessDateSchema,
  ISO8601TimestampSchema,
  JsonValueSchema,
  SchemaVersionSchema,
} from './common.js';

// ============================================
// Metadata Envelope
// ============================================

/**
 * Keys every envelope carries. Caller-supplied metadata may not use them.
 */
export const CORE_METADATA_KEYS = [
  'endpoint',
  'data_negocio',
  'id_loja',
  'timestamp_ingestao',
  'versao_esquema',
  'hash_dados',
  'tamanho_bytes',
  'origem',
  'usuario',
] as const;

export const RecordMetadataSchema = z
  .object({
    /** Source API endpoint (e.g., getGuestChecks) */
    endpoint: z.string().min(1),
    /** Business date assigned by the source system */
    data_negocio: BusinessDateSchema,
    /** Store identifier */
    id_loja: z.string().min(1),
    /** UTC instant the record was written */
    timestamp_ingestao: ISO8601TimestampSchema,
    /** Registry version of the payload's field set */
    versao_esquema: SchemaVersionSchema,
    /** SHA-256 of the canonical payload JSON */
    hash_dados: z.string().regex(/^[a-f0-9]{64}$/, 'Must be a SHA-256 hex digest'),
    /** UTF-8 size of the payload JSON */
    tamanho_bytes: z.number().int().nonnegative(),
    /** Originating system */
    origem: z.string().min(1),
    /** Operator who ran the ingestion */
    usuario: z.string().min(1),
  })
  .passthrough();

export type RecordMetadata = z.infer<typeof RecordMetadataSchema>;

// ============================================
// Stored Record
// ============================================

export const StoredRecordSchema = z.object({
  metadados: RecordMetadataSchema,
  dados: JsonValueSchema,
});

export type StoredRecord = z.infer<typeof StoredRecordSchema>;

// ============================================
// Metadata Sidecar
// ============================================

/**
 * Copy of a record's metadata kept under `metadados/<endpoint>/` for quick
 * lookups without opening the payload file.
 */
export const MetadataSidecarSchema = RecordMetadataSchema.extend({
  /** Absolute path of the record file */
  caminho_arquivo: z.string().min(1),
  /** Record file name */
  nome_arquivo: z.string().min(1),
});

export type MetadataSidecar = z.infer<typeof MetadataSidecarSchema>;
