import { NamedEntityType } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';

const KNOWN_TYPES: ReadonlyMap<string, NamedEntityType> = new Map(
    Object.values(NamedEntityType).map((type) => [type, type] as const)
);

/**
 * Resolves configured and persisted type names to NamedEntityType and holds
 * the priority order used to break ties.
 */
export class EntityTypeRegistry {
    private readonly aliases: ReadonlyMap<string, NamedEntityType>;
    private readonly ranks: ReadonlyMap<NamedEntityType, number>;

    /**
     * @param priority - Highest priority first; must name every NamedEntityType exactly once
     * @param aliases - Extra names (e.g. "Plant_Flora") mapped to a type name
     */
    constructor(priority: readonly string[], aliases: Readonly<Record<string, string>> = {}) {
        const aliasMap = new Map<string, NamedEntityType>();
        for (const [alias, target] of Object.entries(aliases)) {
            const type = KNOWN_TYPES.get(target);
            if (!type) {
                throw new ConfigurationError(`Type alias "${alias}" points to unknown entity type "${target}"`);
            }
            aliasMap.set(alias, type);
        }
        this.aliases = aliasMap;

        const ranks = new Map<NamedEntityType, number>();
        const problems: string[] = [];
        priority.forEach((name, rank) => {
            const type = this.resolve(name);
            if (!type) {
                problems.push(`unknown entity type "${name}"`);
            } else if (ranks.has(type)) {
                problems.push(`"${name}" listed twice`);
            } else {
                ranks.set(type, rank);
            }
        });
        for (const type of KNOWN_TYPES.values()) {
            if (!ranks.has(type)) {
                problems.push(`"${type}" is missing`);
            }
        }
        if (problems.length > 0) {
            throw new ConfigurationError('annotationPriority must be a total order over all entity types', problems);
        }
        this.ranks = ranks;
    }

    /**
     * Type for a canonical or aliased name, or null if unknown.
     */
    resolve(name: string): NamedEntityType | null {
        return KNOWN_TYPES.get(name) ?? this.aliases.get(name) ?? null;
    }

    /**
     * Like `resolve()`, but an unknown name is a configuration error.
     */
    require(name: string): NamedEntityType {
        const type = this.resolve(name);
        if (!type) {
            throw new ConfigurationError(`Unknown entity type "${name}"`);
        }
        return type;
    }

    /** 0 is the highest priority. */
    rank(type: NamedEntityType): number {
        return this.ranks.get(type) ?? Number.MAX_SAFE_INTEGER;
    }

    compare(a: NamedEntityType, b: NamedEntityType): number {
        return this.rank(a) - this.rank(b);
    }

    /** Types in priority order. */
    get priority(): NamedEntityType[] {
        return [...this.ranks.keys()].sort((a, b) => this.compare(a, b));
    }
}
