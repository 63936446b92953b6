/**
 * Topological sorting is a graph algorithm to sort by dependencies
 * Operational complexity O(n)
 * Spacial complexity O(n)
 * Based on Kahn's algorithm with batching support, so every returned batch only depends on earlier batches.
 * @param dag A directed acyclic graph, mapping each vertex to the vertices that depend on it
 */
export const toposort = (dag: Record<string, readonly string[]>): string[][] => {
    const indegrees = count_in_degrees(dag)
    const sorted: string[][] = []

    let roots = get_roots(indegrees)

    while (roots.length) {
        sorted.push(roots)

        const new_roots: string[] = []
        roots.forEach(root => {
            const dependents = dag[root] ?? []
            dependents.forEach(dependent => {
                indegrees[dependent]--
                if (indegrees[dependent] === 0) {
                    new_roots.push(dependent)
                }
            })
        })

        roots = new_roots
    }

    const cyclic = get_non_roots(indegrees)
    if (cyclic.length) {
        throw new Error(
            `Cycle(s) detected between ${cyclic.join(', ')}; toposort only works on acyclic graphs`
        )
    }

    return sorted
}

export const count_in_degrees = (dag: Record<string, readonly string[]>) => {
    const counts: Record<string, number> = {}
    Object.entries(dag).forEach(([vertex, dependents]) => {
        counts[vertex] = counts[vertex] ?? 0
        dependents.forEach(dependent => {
            counts[dependent] = (counts[dependent] ?? 0) + 1
        })
    })
    return counts
}

const filter_by_degree =
    (predicate: (degree: number) => boolean) =>
    (counts: Record<string, number>) =>
        Object.entries(counts)
            .filter(([_, degree]) => predicate(degree))
            .map(([id, _]) => id)

const get_roots = filter_by_degree(degree => degree === 0)

const get_non_roots = filter_by_degree(degree => degree !== 0)
