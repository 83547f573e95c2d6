/**
 * Tests for the vertexmap command line
 */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { ValidationError, sequentialIdGenerator, silentLogger } from '@vertexmap/core'
import { LoadError, createProgram } from '../src'
import { MAPPING_CSV } from './fixtures/mapping'

describe('vertexmap CLI', () => {
  let dir: string
  let file: string
  let out: string
  let printed: string[]

  const run = (...args: string[]) =>
    createProgram({
      logger: silentLogger,
      print: (line) => printed.push(line),
      idGenerator: sequentialIdGenerator(),
    }).parseAsync(args, { from: 'user' })

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'vertexmap-cli-'))
    file = join(dir, 'mapping.csv')
    out = join(dir, 'out')
    printed = []
    await writeFile(file, MAPPING_CSV, 'utf8')
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  describe('inspect', () => {
    it('lists vertex types and edges', async () => {
      await run('inspect', file)

      expect(printed).toEqual([
        'City (city) [central]: 2 entities',
        'Person (person): 2 entities',
        'edges: 3',
        '  (0) [Alice.person] --.lives-in.-- [NYC.city]',
        '  (1) [Bob.person] --.moved-to.-->> [LA.city]',
        '  (2) [Bob.person] --- [Alice.person]',
      ])
    })

    it('rejects a file that is not a CSV', async () => {
      await expect(run('inspect', join(dir, 'mapping.txt'))).rejects.toBeInstanceOf(LoadError)
    })
  })

  describe('link', () => {
    it('links every group to every other', async () => {
      await run('link', file, '-g', 'person=Alice', '-g', 'city=LA', '-o', out)

      expect(printed).toEqual([
        'stored 1 new edges',
        `wrote ${join(out, 'm-1-graph-mapping.gv')}`,
        `wrote ${join(out, 'm-1-all_entities.gv.csv')}`,
      ])
      const csv = await readFile(join(out, 'm-1-all_entities.gv.csv'), 'utf8')
      expect(csv.trimEnd().split('\n').at(-1)).toBe('Alice,Person,person,false,,false,LA,City,city')
    })

    it('links toward the central vertex type', async () => {
      await run('link', file, '--group', 'person=Alice,Bob', '--group', 'city=LA', '--central', '-t', 'visited', '-o', out)

      expect(printed[0]).toBe('stored 2 new edges')
      const csv = await readFile(join(out, 'm-1-all_entities.gv.csv'), 'utf8')
      expect(csv.trimEnd().split('\n').slice(-2)).toEqual([
        'Alice,Person,person,false,visited,false,LA,City,city',
        'Bob,Person,person,false,visited,false,LA,City,city',
      ])
    })

    it('creates directed edges from the first group to the second', async () => {
      await run('link', file, '-g', 'person=Alice', '-g', 'city=NYC', '--directed', '-t', 'moved-to', '-o', out)

      expect(printed[0]).toBe('stored 1 new edges')
      const dot = await readFile(join(out, 'm-1-graph-mapping.gv'), 'utf8')
      expect(dot).toContain(
        '  "Alice.person" -- "NYC.city" [label="moved-to", r_id="3", dir="forward", color="gray", fontcolor="gray"];\n',
      )
    })

    it('requires at least one group', async () => {
      await expect(run('link', file, '-o', out)).rejects.toThrow(
        'Invalid option --group: At least one --group is required',
      )
    })

    it('rejects unknown vertex types and entities', async () => {
      await expect(run('link', file, '-g', 'planet=Mars', '-o', out)).rejects.toThrow('Unknown vertex type: planet')
      await expect(run('link', file, '-g', 'city=Paris', '-o', out)).rejects.toThrow(
        "Vertex type 'city' has no entity 'Paris'",
      )
    })

    it('requires two groups for directed linking', async () => {
      await expect(run('link', file, '-g', 'person=Alice', '--directed', '-o', out)).rejects.toThrow(
        '--directed needs exactly two non-empty groups',
      )
    })

    it('requires a central vertex type for central linking', async () => {
      await writeFile(file, 'entity,vertex_id,entity2,vertex_id2\nAlice,person,NYC,city\n', 'utf8')

      await expect(run('link', file, '-g', 'person=Alice', '-g', 'city=NYC', '--central', '-o', out)).rejects.toBeInstanceOf(
        ValidationError,
      )
    })
  })

  describe('unlink', () => {
    it('removes edges by id', async () => {
      await run('unlink', file, '-i', '1', '--id', '2', '-o', out)

      expect(printed[0]).toBe('removed 2 edges')
      const csv = await readFile(join(out, 'm-1-all_entities.gv.csv'), 'utf8')
      expect(csv.trimEnd().split('\n').slice(5)).toEqual(['Alice,Person,person,false,lives-in,false,NYC,City,city'])
    })

    it('rejects ids that are not numbers', async () => {
      await expect(run('unlink', file, '-i', 'first', '-o', out)).rejects.toBeInstanceOf(ValidationError)
    })
  })
})
