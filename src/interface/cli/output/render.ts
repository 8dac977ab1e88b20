/**
 * Human-readable rendering of lineage records (stderr)
 */

import type {
  ColumnLineageOutput,
  LineageEdge,
  LineageGraphResponse,
  LineageNode,
  LineageRun,
  StatusOutput,
} from '../../../shared/types.js';
import { edgeCategoryOf } from '../../../shared/categories.js';
import { formatBold, formatBytes, formatDim, formatHighlight, formatWarning } from './formatter.js';

function write(line = ''): void {
  process.stderr.write(line + '\n');
}

function validity(edge: Pick<LineageEdge, 'valid_from' | 'valid_to'>): string {
  return `[${edge.valid_from}, ${edge.valid_to ?? 'open'})`;
}

export function renderNode(node: LineageNode): void {
  write();
  write(`  ${formatBold(node.name)} ${formatDim(`(${node.type})`)}`);
  write(`    ${formatDim('id:')} ${node.id}`);
  if (node.qualified_name) write(`    ${formatDim('qualified name:')} ${node.qualified_name}`);
  if (node.description) write(`    ${formatDim('description:')} ${node.description}`);
  if (node.system || node.platform) {
    write(`    ${formatDim('system:')} ${[node.system, node.platform].filter(Boolean).join(' / ')}`);
  }
  if (node.location) write(`    ${formatDim('location:')} ${node.location}`);
  if (node.classification) write(`    ${formatDim('classification:')} ${node.classification}`);
  if (node.documentation_url) write(`    ${formatDim('docs:')} ${node.documentation_url}`);
  if (Object.keys(node.tags).length > 0) write(`    ${formatDim('tags:')} ${JSON.stringify(node.tags)}`);
  if (Object.keys(node.attributes).length > 0) {
    write(`    ${formatDim('attributes:')} ${JSON.stringify(node.attributes)}`);
  }
  if (node.deleted_at) write(`    ${formatWarning(`deleted at ${node.deleted_at}`)}`);
  write();
}

export function renderNodeList(nodes: LineageNode[]): void {
  write();
  if (nodes.length === 0) {
    write('  No nodes found.');
    write();
    return;
  }
  for (const node of nodes) {
    const deleted = node.deleted_at ? ` ${formatWarning('deleted')}` : '';
    write(`  ${formatBold(node.name)} ${formatDim(`(${node.type})`)}${deleted}`);
    write(`    ${formatDim(node.id)}${node.qualified_name ? `  ${formatDim(node.qualified_name)}` : ''}`);
  }
  write();
}

export function renderEdge(edge: LineageEdge): void {
  write();
  write(`  ${edge.source_id} -[${formatHighlight(edge.edge_type)}]-> ${edge.target_id}`);
  write(`    ${formatDim('id:')} ${edge.id}`);
  write(`    ${formatDim('valid:')} ${validity(edge)}`);
  if (edge.created_by) write(`    ${formatDim('created by:')} ${edge.created_by}`);
  if (Object.keys(edge.metadata).length > 0) {
    write(`    ${formatDim('metadata:')} ${JSON.stringify(edge.metadata)}`);
  }
  write();
}

export function renderEdgeList(edges: LineageEdge[]): void {
  write();
  if (edges.length === 0) {
    write('  No edges found.');
    write();
    return;
  }
  for (const edge of edges) {
    write(`  ${edge.source_id} -[${formatHighlight(edge.edge_type)}]-> ${edge.target_id}`);
    write(`    ${formatDim(edge.id)}  ${formatDim(validity(edge))}`);
  }
  write();
}

export function renderColumns(output: ColumnLineageOutput): void {
  write();
  write(`  ${formatBold(`Columns on edge ${output.edge.id} (${output.columns.length}):`)}`);
  for (const column of output.columns) {
    const details = [
      column.transformation_type,
      column.transformation,
      column.confidence !== null ? `confidence ${column.confidence}` : null,
    ].filter((d): d is string => d !== null);
    const suffix = details.length > 0 ? `  ${formatDim(details.join(', '))}` : '';
    write(`    ${column.source_column} -> ${column.target_column}${suffix}`);
  }
  write();
}

/** Nodes grouped by depth, then every edge by name */
export function renderGraph(graph: LineageGraphResponse): void {
  const { query } = graph;
  write();
  write(
    `  ${formatBold(`Lineage ${query.direction} of ${query.seed_id}`)} ` +
      formatDim(`depth ${query.depth}, as of ${query.as_of}`),
  );
  write(`  ${graph.node_count} nodes, ${graph.edge_count} edges`);
  write();

  const names = new Map(graph.nodes.map((n) => [n.id, n.name]));
  let depth = -1;
  for (const node of graph.nodes) {
    if (node.depth !== depth) {
      depth = node.depth;
      write(`  ${formatBold(depth === 0 ? 'Seed' : `Depth ${depth}`)}`);
    }
    write(`    ${node.name} ${formatDim(`(${node.type})`)} ${formatDim(node.id)}`);
  }

  if (graph.edges.length > 0) {
    write();
    write(`  ${formatBold('Edges:')}`);
    for (const edge of graph.edges) {
      const source = names.get(edge.source_id) ?? edge.source_id;
      const target = names.get(edge.target_id) ?? edge.target_id;
      const category = formatDim(`(${edgeCategoryOf(edge.edge_type)})`);
      write(`    ${source} -[${formatHighlight(edge.edge_type)}]-> ${target} ${category}`);
    }
  }
  write();
}

export function renderRun(run: LineageRun): void {
  write();
  write(`  ${formatBold(run.run_id)} ${formatDim(`(${run.pipeline_name})`)} ${formatHighlight(run.status)}`);
  write(`    ${formatDim('started:')} ${run.started_at}`);
  if (run.completed_at) write(`    ${formatDim('completed:')} ${run.completed_at}`);
  if (run.node_id) write(`    ${formatDim('node:')} ${run.node_id}`);
  if (run.git_sha || run.git_branch) {
    write(`    ${formatDim('git:')} ${[run.git_branch, run.git_sha].filter(Boolean).join(' @ ')}`);
  }
  if (run.environment) write(`    ${formatDim('environment:')} ${run.environment}`);
  if (Object.keys(run.metrics).length > 0) write(`    ${formatDim('metrics:')} ${JSON.stringify(run.metrics)}`);
  if (run.error_message) write(`    ${formatWarning(run.error_message)}`);
  write();
}

export function renderRunList(runs: LineageRun[]): void {
  write();
  if (runs.length === 0) {
    write('  No runs found.');
    write();
    return;
  }
  for (const run of runs) {
    write(`  ${formatBold(run.run_id)} ${formatHighlight(run.status)} ${formatDim(run.started_at)}`);
  }
  write();
}

export function renderStatus(status: StatusOutput): void {
  write();
  write(`  ${formatBold('Lineage Status')}`);
  write(`  ${formatBold('Nodes:')}     ${status.total_nodes} (${status.deleted_nodes} deleted)`);
  write(`  ${formatBold('Edges:')}     ${status.total_edges} (${status.active_edges} active)`);
  write(`  ${formatBold('Columns:')}   ${status.column_mappings}`);
  write(`  ${formatBold('Runs:')}      ${status.total_runs}`);
  write(`  ${formatBold('DB size:')}   ${formatBytes(status.db_size_bytes)}`);
  write();
}
