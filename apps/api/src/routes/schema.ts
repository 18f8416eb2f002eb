/**
 * Schema introspection.
 *
 * Describes the persisted tables straight from the drizzle definitions so
 * the dashboard never drifts from `@duka/db`.
 */

import { Hono } from 'hono'
import { getTableName } from 'drizzle-orm'
import { getTableConfig, type PgTable } from 'drizzle-orm/pg-core'
import { ok } from './_api.js'

interface SchemaColumn {
  name: string
  type: string
  nullable: boolean
  primaryKey: boolean
}

interface SchemaForeignKey {
  columns: string[]
  references: { table: string; columns: string[] }
  onDelete: string | null
}

export interface SchemaEntity {
  name: string
  tableName: string
  columns: SchemaColumn[]
  foreignKeys: SchemaForeignKey[]
}

export interface SchemaDocument {
  entities: SchemaEntity[]
  summary: {
    totalEntities: number
    totalColumns: number
    totalRelationships: number
  }
}

function toEntityName(tableName: string): string {
  return tableName
    .split('_')
    .filter(Boolean)
    .map((segment) => segment.charAt(0).toUpperCase() + segment.slice(1))
    .join(' ')
}

export function describeTables(tables: Record<string, PgTable>): SchemaDocument {
  const entities = Object.values(tables).map((table): SchemaEntity => {
    const config = getTableConfig(table)
    return {
      name: toEntityName(config.name),
      tableName: config.name,
      columns: config.columns.map((column) => ({
        name: column.name,
        type: column.getSQLType(),
        nullable: !column.notNull,
        primaryKey: column.primary,
      })),
      foreignKeys: config.foreignKeys.map((fk) => {
        const ref = fk.reference()
        return {
          columns: ref.columns.map((column) => column.name),
          references: {
            table: getTableName(ref.foreignTable),
            columns: ref.foreignColumns.map((column) => column.name),
          },
          onDelete: fk.onDelete ?? null,
        }
      }),
    }
  })

  return {
    entities,
    summary: {
      totalEntities: entities.length,
      totalColumns: entities.reduce((sum, entity) => sum + entity.columns.length, 0),
      totalRelationships: entities.reduce((sum, entity) => sum + entity.foreignKeys.length, 0),
    },
  }
}

export function createSchemaRoutes(tables: Record<string, PgTable>) {
  const routes = new Hono()
  let cached: SchemaDocument | null = null

  routes.get('/', (c) => {
    cached ??= describeTables(tables)
    return ok(c, cached)
  })

  return routes
}
