import { describe, it, expect } from 'vitest';
import { validateChains, validateEntity, validateRelation, type ValidationResult } from '../schema/validation.js';
import { orderRelations } from '../graph/relation-order.js';
import { Modality, RelationType, type RelationArgument } from '../types/index.js';
import { relation } from './helpers.js';

function ruleOf<T>(result: ValidationResult<T>): string | undefined {
    return result.ok ? undefined : result.failure.rule;
}

function arg(role: string, id: string, kind: 'entity' | 'relation' = 'entity'): RelationArgument {
    return { role, ref: { kind, id } };
}

describe('validateEntity', () => {
    it('should accept a typed, in-bounds entity', () => {
        const result = validateEntity({ id: 'T1', type: 'Pest', span: { start: 0, end: 5 } }, 10);
        expect(result).toEqual({ ok: true, value: { id: 'T1', type: 'Pest', span: { start: 0, end: 5 } } });
    });

    it('should reject an unknown type tag', () => {
        expect(ruleOf(validateEntity({ id: 'T1', type: 'Insect', span: { start: 0, end: 5 } }, 10))).toBe('UnknownEntityType');
    });

    it('should reject empty, inverted and fractional spans', () => {
        expect(ruleOf(validateEntity({ id: 'T1', type: 'Pest', span: { start: 3, end: 3 } }, 10))).toBe('SpanOrder');
        expect(ruleOf(validateEntity({ id: 'T1', type: 'Pest', span: { start: 5, end: 2 } }, 10))).toBe('SpanOrder');
        expect(ruleOf(validateEntity({ id: 'T1', type: 'Pest', span: { start: 1.5, end: 4 } }, 10))).toBe('SpanOrder');
    });

    it('should reject spans outside the text', () => {
        expect(ruleOf(validateEntity({ id: 'T1', type: 'Pest', span: { start: 0, end: 11 } }, 10))).toBe('SpanBounds');
        expect(ruleOf(validateEntity({ id: 'T1', type: 'Pest', span: { start: -1, end: 2 } }, 10))).toBe('SpanBounds');
    });

    it('should check the linking identifier', () => {
        const span = { start: 0, end: 5 };
        expect(ruleOf(validateEntity({ id: 'T1', type: 'Pest', span, link: { authority: 'Wikidata', code: 'Q1' } }, 10))).toBe(
            'UnknownAuthority'
        );
        expect(ruleOf(validateEntity({ id: 'T1', type: 'Pest', span, link: { authority: 'GeoNames', code: '  ' } }, 10))).toBe(
            'EmptyLinkCode'
        );

        const linked = validateEntity({ id: 'T1', type: 'Pest', span, link: { authority: 'NCBI_Taxonomy', code: '2371' } }, 10);
        expect(linked.ok && linked.value.link).toEqual({ authority: 'NCBI_Taxonomy', code: '2371' });
    });
});

describe('validateRelation', () => {
    const base = { id: 'R1', modality: 'Asserted' };

    it('should accept required roles with or without optional ones', () => {
        expect(validateRelation({ ...base, type: 'Transmits', arguments: [arg('agent', 'T1'), arg('host', 'T2')] }).ok).toBe(true);
        expect(
            validateRelation({
                ...base,
                type: 'Transmits',
                arguments: [arg('agent', 'T1'), arg('host', 'T2'), arg('pathogen', 'T3')],
            }).ok
        ).toBe(true);
    });

    it('should reject an unknown relation type before anything else', () => {
        expect(ruleOf(validateRelation({ ...base, type: 'Eats', arguments: [] }))).toBe('UnknownRelationType');
    });

    it('should reject an unknown modality', () => {
        expect(ruleOf(validateRelation({ id: 'R1', modality: 'Probable', type: 'Causes', arguments: [] }))).toBe('UnknownModality');
    });

    it('should enforce role names and cardinality', () => {
        expect(ruleOf(validateRelation({ ...base, type: 'Causes', arguments: [arg('agent', 'T1'), arg('vector', 'T2')] }))).toBe(
            'UnknownRole'
        );
        expect(
            ruleOf(validateRelation({ ...base, type: 'Causes', arguments: [arg('agent', 'T1'), arg('agent', 'T2'), arg('effect', 'T3')] }))
        ).toBe('DuplicateRole');
        expect(ruleOf(validateRelation({ ...base, type: 'Affects', arguments: [arg('agent', 'T1')] }))).toBe('MissingRole');
    });

    it('should allow repeatable roles to occur more than once', () => {
        const result = validateRelation({
            ...base,
            type: 'Reports',
            arguments: [arg('reporter', 'T1'), arg('event', 'R2', 'relation'), arg('event', 'R3', 'relation')],
        });
        expect(result.ok).toBe(true);
    });

    it('should check what kind of argument a role takes', () => {
        expect(ruleOf(validateRelation({ ...base, type: 'OccursOn', arguments: [arg('event', 'T1'), arg('date', 'T2')] }))).toBe(
            'ArgumentKind'
        );
        expect(
            validateRelation({ ...base, type: 'LocatedIn', arguments: [arg('subject', 'R2', 'relation'), arg('location', 'T1')] }).ok
        ).toBe(true);
    });
});

describe('validateChains', () => {
    const ids = new Set(['T1', 'T2', 'T3']);

    it('should accept disjoint chains of known entities', () => {
        expect(validateChains([{ id: 'C1', entityIds: ['T1', 'T2'] }], ids).ok).toBe(true);
    });

    it('should reject empty, dangling and overlapping chains', () => {
        expect(ruleOf(validateChains([{ id: 'C1', entityIds: [] }], ids))).toBe('EmptyChain');
        expect(ruleOf(validateChains([{ id: 'C1', entityIds: ['T9'] }], ids))).toBe('UnknownChainMember');
        expect(
            ruleOf(
                validateChains(
                    [
                        { id: 'C1', entityIds: ['T1', 'T2'] },
                        { id: 'C2', entityIds: ['T2', 'T3'] },
                    ],
                    ids
                )
            )
        ).toBe('OverlappingChains');
    });

    it('should reject a chain id used twice', () => {
        const result = validateChains(
            [
                { id: 'C1', entityIds: ['T1'] },
                { id: 'C1', entityIds: ['T2', 'T3'] },
            ],
            ids
        );
        expect(ruleOf(result)).toBe('DuplicateChainId');
        expect(result.ok ? undefined : result.failure.itemId).toBe('C1');
    });
});

describe('orderRelations', () => {
    it('should put nested relations before the relations using them, ties by id', () => {
        const { order, cyclic } = orderRelations([
            relation('R3', RelationType.Reports, { reporter: 'T1', event: 'R2' }),
            relation('R2', RelationType.OccursOn, { event: 'R1', date: 'T2' }),
            relation('R1', RelationType.Affects, { agent: 'T1', target: 'T3' }),
            relation('R10', RelationType.Affects, { agent: 'T4', target: 'T3' }),
        ]);

        expect(order).toEqual(['R1', 'R10', 'R2', 'R3']);
        expect(cyclic).toEqual([]);
    });

    it('should report relations on or behind a cycle', () => {
        const { order, cyclic } = orderRelations([
            relation('R1', RelationType.LocatedIn, { subject: 'R2', location: 'T1' }),
            relation('R2', RelationType.LocatedIn, { subject: 'R1', location: 'T1' }),
            relation('R3', RelationType.Affects, { agent: 'T1', target: 'T2' }),
            relation('R4', RelationType.OccursOn, { event: 'R1', date: 'T2' }, Modality.Negated),
        ]);

        expect(order).toEqual(['R3']);
        expect(cyclic).toEqual(['R1', 'R2', 'R4']);
    });

    it('should report a relation that takes itself as argument', () => {
        const { order, cyclic } = orderRelations([relation('R1', RelationType.LocatedIn, { subject: 'R1', location: 'T1' })]);
        expect(order).toEqual([]);
        expect(cyclic).toEqual(['R1']);
    });
});
