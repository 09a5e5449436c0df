import test from 'ava'
import {internalImageLink, linkSatisfiedBy} from '../links.js'

test('internalImageLink: names a pipeline tag', t => {
  t.deepEqual(internalImageLink('src'), {kind: 'internal-image', tag: 'src'})
})

test('linkSatisfiedBy: matches on kind and tag', t => {
  t.true(linkSatisfiedBy(internalImageLink('src'), internalImageLink('src')))
  t.false(linkSatisfiedBy(internalImageLink('src'), internalImageLink('root')))
})
