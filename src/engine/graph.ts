import { createError } from '../core/errors/taxonomy'
import { ERROR_CODES } from '../core/errors/codes'

/**
 * Directed acyclic graph of resources keyed by address.
 * An edge `from -> to` means `from` depends on `to`, so `to` is evaluated first.
 */
export class DependencyGraph {

    private readonly dependencies = new Map<string, Set<string>>()

    addNode(address: string): void {
        if (!this.dependencies.has(address)) {
            this.dependencies.set(address, new Set())
        }
    }

    hasNode(address: string): boolean {
        return this.dependencies.has(address)
    }

    /**
     * Both nodes must exist: unknown targets are dangling references and are rejected
     * by the evaluator before edges are added.
     */
    addDependency(from: string, to: string): void {
        const deps = this.dependencies.get(from)
        if (!deps || !this.dependencies.has(to)) {
            throw new Error(`Cannot add edge ${from} -> ${to}: unknown node`)
        }
        deps.add(to)
    }

    nodes(): string[] {
        return [...this.dependencies.keys()].sort()
    }

    dependenciesOf(address: string): string[] {
        return [...(this.dependencies.get(address) ?? [])].sort()
    }

    dependentsOf(address: string): string[] {
        return this.nodes().filter(node => this.dependencies.get(node)?.has(address))
    }

    /**
     * Kahn's algorithm. Among nodes ready at the same time the smallest address goes first,
     * so the order is stable across runs.
     *
     * @throws DeclarationError DECLARATION_DEPENDENCY_CYCLE naming the cycle
     */
    topologicalOrder(): string[] {
        const remaining = new Map<string, number>()
        for (const [node, deps] of this.dependencies) {
            remaining.set(node, deps.size)
        }

        const ready = this.nodes().filter(node => remaining.get(node) === 0)
        const order: string[] = []

        while (ready.length > 0) {
            ready.sort()
            const node = ready.shift()
            if (node === undefined) {
                break
            }
            order.push(node)
            for (const dependent of this.dependentsOf(node)) {
                const count = (remaining.get(dependent) ?? 0) - 1
                remaining.set(dependent, count)
                if (count === 0) {
                    ready.push(dependent)
                }
            }
        }

        if (order.length !== this.dependencies.size) {
            const cycle = this.findCycle(new Set(order))
            throw createError(ERROR_CODES.DECLARATION_DEPENDENCY_CYCLE, { cycle: cycle.join(' -> ') })
        }

        return order
    }

    /**
     * Depth-first search among unordered nodes. Returns the cycle path with its first node repeated at the end.
     */
    private findCycle(ordered: Set<string>): string[] {
        const visiting: string[] = []
        const done = new Set<string>(ordered)

        const visit = (node: string): string[] | undefined => {
            const start = visiting.indexOf(node)
            if (start >= 0) {
                return [...visiting.slice(start), node]
            }
            if (done.has(node)) {
                return undefined
            }
            visiting.push(node)
            for (const dep of this.dependenciesOf(node)) {
                const cycle = visit(dep)
                if (cycle) {
                    return cycle
                }
            }
            visiting.pop()
            done.add(node)
            return undefined
        }

        for (const node of this.nodes()) {
            const cycle = visit(node)
            if (cycle) {
                return cycle
            }
        }
        return []
    }
}
