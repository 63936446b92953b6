import { expect } from 'chai'
import { describe, it } from 'mocha'
import { count_in_degrees, toposort } from './toposort'

describe('toposort', () => {
    it('toposorts an empty graph', () => {
        expect(toposort({})).to.deep.equal([])
    })

    it('puts independent vertices in the same batch', () => {
        expect(
            toposort({
                authors: ['books'],
                publishers: ['books'],
                books: [],
            })
        ).to.deep.equal([['authors', 'publishers'], ['books']])
    })

    it('toposorts a deeper graph in batches', () => {
        const result = toposort({
            a: ['c', 'f'],
            b: ['d', 'e'],
            c: ['f'],
            d: ['f', 'g'],
            e: ['h'],
            f: ['i'],
            g: ['j'],
            h: ['j'],
            i: [],
            j: [],
        })
        expect(result).to.deep.equal([
            ['a', 'b'],
            ['c', 'd', 'e'],
            ['f', 'g', 'h'],
            ['i', 'j'],
        ])
    })

    it('handles dependents that are not keys of the graph', () => {
        expect(toposort({ '0': ['1', '2'] })).to.deep.equal([['0'], ['1', '2']])
    })

    it('errors on a cyclic graph', () => {
        expect(() =>
            toposort({
                a: ['b', 'c'],
                b: ['c'],
                c: ['d', 'e'],
                d: ['b'],
                e: [],
            })
        ).to.throw(Error, 'Cycle(s) detected between b, c, d, e;')
    })

    it('counts in-degrees', () => {
        expect(
            count_in_degrees({
                a: ['b', 'c'],
                b: ['c'],
                c: [],
                d: [],
            })
        ).to.deep.equal({
            a: 0,
            b: 1,
            c: 2,
            d: 0,
        })
    })
})
