import type { Migration } from '../types.js';

const INITIAL_SCHEMA_SQL = `
-- schema_version
CREATE TABLE IF NOT EXISTS schema_version (
    version     INTEGER PRIMARY KEY,
    applied_at  TEXT    NOT NULL,
    description TEXT
);

-- lineage_nodes
CREATE TABLE IF NOT EXISTS lineage_nodes (
    id                  TEXT    PRIMARY KEY,
    type                TEXT    NOT NULL,
    name                TEXT    NOT NULL,
    qualified_name      TEXT,
    description         TEXT,
    documentation_url   TEXT,
    system              TEXT,
    platform            TEXT,
    location            TEXT,
    classification      TEXT,
    tags                TEXT    NOT NULL DEFAULT '{}',
    attributes          TEXT    NOT NULL DEFAULT '{}',
    created_at          TEXT    NOT NULL,
    updated_at          TEXT    NOT NULL,
    deleted_at          TEXT
);

CREATE INDEX IF NOT EXISTS idx_node_type_name ON lineage_nodes(type, name);
CREATE INDEX IF NOT EXISTS idx_node_system_platform ON lineage_nodes(system, platform);
CREATE INDEX IF NOT EXISTS idx_node_classification ON lineage_nodes(classification) WHERE classification IS NOT NULL;
CREATE INDEX IF NOT EXISTS idx_node_created_at ON lineage_nodes(created_at);
CREATE INDEX IF NOT EXISTS idx_node_deleted_at ON lineage_nodes(deleted_at) WHERE deleted_at IS NULL;
-- qualified names are unique among live nodes only
CREATE UNIQUE INDEX IF NOT EXISTS uq_node_qualified_name ON lineage_nodes(qualified_name)
    WHERE qualified_name IS NOT NULL AND deleted_at IS NULL;

-- lineage_edges
CREATE TABLE IF NOT EXISTS lineage_edges (
    id          TEXT    PRIMARY KEY,
    source_id   TEXT    NOT NULL
                        REFERENCES lineage_nodes(id) ON DELETE CASCADE,
    target_id   TEXT    NOT NULL
                        REFERENCES lineage_nodes(id) ON DELETE CASCADE,
    edge_type   TEXT    NOT NULL,
    metadata    TEXT    NOT NULL DEFAULT '{}',
    valid_from  TEXT    NOT NULL,
    valid_to    TEXT,
    created_at  TEXT    NOT NULL,
    created_by  TEXT,
    CHECK (valid_to IS NULL OR valid_to > valid_from)
);

CREATE INDEX IF NOT EXISTS idx_edge_source_type ON lineage_edges(source_id, edge_type);
CREATE INDEX IF NOT EXISTS idx_edge_target_type ON lineage_edges(target_id, edge_type);
CREATE INDEX IF NOT EXISTS idx_edge_temporal ON lineage_edges(valid_from, valid_to);
CREATE INDEX IF NOT EXISTS idx_edge_type_temporal ON lineage_edges(edge_type, valid_from, valid_to);
-- at most one active edge per (source, target, edge_type)
CREATE UNIQUE INDEX IF NOT EXISTS uq_edge_active ON lineage_edges(source_id, target_id, edge_type)
    WHERE valid_to IS NULL;

-- column_lineage
CREATE TABLE IF NOT EXISTS column_lineage (
    id                  TEXT    PRIMARY KEY,
    edge_id             TEXT    NOT NULL
                                REFERENCES lineage_edges(id) ON DELETE CASCADE,
    source_column       TEXT    NOT NULL,
    target_column       TEXT    NOT NULL,
    transformation      TEXT,
    transformation_type TEXT,
    confidence          REAL    CHECK (confidence IS NULL OR (confidence >= 0 AND confidence <= 1)),
    metadata            TEXT    NOT NULL DEFAULT '{}',
    created_at          TEXT    NOT NULL
);

CREATE UNIQUE INDEX IF NOT EXISTS uq_column_lineage ON column_lineage(edge_id, source_column, target_column);
CREATE INDEX IF NOT EXISTS idx_column_source ON column_lineage(source_column);
CREATE INDEX IF NOT EXISTS idx_column_target ON column_lineage(target_column);

-- lineage_runs
CREATE TABLE IF NOT EXISTS lineage_runs (
    id              TEXT    PRIMARY KEY,
    node_id         TEXT    REFERENCES lineage_nodes(id) ON DELETE SET NULL,
    run_id          TEXT    NOT NULL UNIQUE,
    pipeline_name   TEXT    NOT NULL,
    status          TEXT    NOT NULL
                            CHECK(status IN ('created','running','success','failed')),
    started_at      TEXT    NOT NULL,
    completed_at    TEXT,
    git_sha         TEXT,
    git_branch      TEXT,
    environment     TEXT,
    parameters      TEXT    NOT NULL DEFAULT '{}',
    triggered_by    TEXT,
    executor        TEXT,
    metrics         TEXT    NOT NULL DEFAULT '{}',
    error_message   TEXT,
    created_at      TEXT    NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_run_node ON lineage_runs(node_id);
CREATE INDEX IF NOT EXISTS idx_run_pipeline ON lineage_runs(pipeline_name);
CREATE INDEX IF NOT EXISTS idx_run_status ON lineage_runs(status);
CREATE INDEX IF NOT EXISTS idx_run_started_at ON lineage_runs(started_at);
`;

export const migration001: Migration = {
  version: 1,
  description: 'Initial lineage schema',
  up: (db) => {
    db.exec(INITIAL_SCHEMA_SQL);
    db.prepare(
      'INSERT INTO schema_version (version, applied_at, description) VALUES (?, ?, ?)',
    ).run(1, new Date().toISOString(), 'Initial lineage schema');
  },
};
