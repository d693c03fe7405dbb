// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { GraphNode, GraphView, RelationshipEdge } from "./types.js";

/**
 * Directed multigraph of relationship declarations.
 * Adjacency list (source → edges) plus a reverse index (target → edges).
 * Edges may point at ids that are not nodes: those are broken references.
 */
export class RelationshipGraph {
    private nodeMap: Map<string, GraphNode> = new Map();
    private outEdges: Map<string, RelationshipEdge[]> = new Map();
    private inEdges: Map<string, RelationshipEdge[]> = new Map();
    private totalEdges = 0;

    public get nodeCount(): number {
        return this.nodeMap.size;
    }

    public get edgeCount(): number {
        return this.totalEdges;
    }

    public addNode(node: GraphNode): void {
        this.nodeMap.set(node.id, node);
    }

    public hasNode(id: string): boolean {
        return this.nodeMap.has(id);
    }

    public getNode(id: string): GraphNode | undefined {
        return this.nodeMap.get(id);
    }

    public addEdge(edge: RelationshipEdge): void {
        appendTo(this.outEdges, edge.sourceId, edge);
        appendTo(this.inEdges, edge.targetId, edge);
        this.totalEdges++;
    }

    /**
     * Outgoing edges in declaration order
     */
    public successors(id: string): readonly RelationshipEdge[] {
        return this.outEdges.get(id) ?? [];
    }

    public predecessors(id: string): readonly RelationshipEdge[] {
        return this.inEdges.get(id) ?? [];
    }

    public outDegree(id: string): number {
        return this.successors(id).length;
    }

    public inDegree(id: string): number {
        return this.predecessors(id).length;
    }

    public *nodes(): IterableIterator<GraphNode> {
        yield* this.nodeMap.values();
    }

    public *edges(): IterableIterator<RelationshipEdge> {
        for (const edges of this.outEdges.values()) {
            yield* edges;
        }
    }

    /**
     * A copy of the graph, or of the subgraph induced by the given ids.
     * Ids that are not nodes are ignored.
     */
    public view(ids?: Iterable<string>): GraphView {
        if (ids === undefined) {
            return {
                nodes: [...this.nodes()].map((n) => ({ ...n })),
                edges: [...this.edges()].map((e) => ({ ...e })),
            };
        }
        const included = new Set<string>();
        for (const id of ids) {
            if (this.nodeMap.has(id)) {
                included.add(id);
            }
        }
        const nodes: GraphNode[] = [];
        const edges: RelationshipEdge[] = [];
        for (const node of this.nodes()) {
            if (included.has(node.id)) {
                nodes.push({ ...node });
                for (const edge of this.successors(node.id)) {
                    if (included.has(edge.targetId)) {
                        edges.push({ ...edge });
                    }
                }
            }
        }
        return { nodes, edges };
    }
}

function appendTo(
    map: Map<string, RelationshipEdge[]>,
    key: string,
    edge: RelationshipEdge,
): void {
    let edges = map.get(key);
    if (!edges) {
        edges = [];
        map.set(key, edges);
    }
    edges.push(edge);
}
