import type { Annotation, LiteralAnnotation } from '../types/index.js';

/**
 * Replace every annotated span with `{type<begin/end>}`, e.g.
 * `{plant<0/8>} mit {miscellaneous<13/18>}`. Literals render as
 * `{literal<begin/end>}`. Used for logging.
 */
export function toAbstractedString(
    text: string,
    annotations: readonly Annotation[],
    literals: readonly LiteralAnnotation[] = []
): string {
    const spans = [
        ...annotations.map((a) => ({ begin: a.begin, end: a.end, label: a.namedEntityType.toLowerCase() })),
        ...literals.map((l) => ({ begin: l.begin, end: l.end, label: 'literal' })),
    ].sort((a, b) => a.begin - b.begin || b.end - a.end);

    let output = '';
    let cursor = 0;
    for (const span of spans) {
        if (span.begin < cursor) continue;
        output += text.slice(cursor, span.begin) + `{${span.label}<${span.begin}/${span.end}>}`;
        cursor = span.end;
    }
    return output + text.slice(cursor);
}
