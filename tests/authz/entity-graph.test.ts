import { EntityGraph } from '../../src/authz/entity-graph';
import { ProgramType } from '../../src/domain/organization';
import { Role } from '../../src/domain/rbac';
import { createMemoryStore } from '../../src/storage/memory-store';
import { Store } from '../../src/storage/store';
import { World, buildWorld, orgScope, programScope, seedGrant } from '../fixtures';

describe('EntityGraph', () => {
  let store: Store;
  let graph: EntityGraph;
  let world: World;

  beforeEach(async () => {
    store = createMemoryStore();
    graph = new EntityGraph(store);
    world = await buildWorld(graph);
  });

  test('the managing organization is always an author', () => {
    expect(world.acmeMba.authoringOrganizationIds).toEqual([world.acme.id]);
    expect(world.jointMasters.authoringOrganizationIds).toEqual([world.globex.id, world.acme.id]);
  });

  test('a program target applies its own scope and each authoring organization', async () => {
    const resolved = await graph.resolveTarget(programScope(world.jointMasters));

    expect(resolved.applicableScopes).toEqual([
      programScope(world.jointMasters),
      orgScope(world.globex),
      orgScope(world.acme),
    ]);
    expect(resolved.program?.key).toBe('joint-masters');
  });

  test('an organization target applies only itself', async () => {
    const resolved = await graph.resolveTarget(orgScope(world.acme));

    expect(resolved.applicableScopes).toEqual([orgScope(world.acme)]);
    expect(resolved.program).toBeUndefined();
  });

  test('rejects duplicate keys', async () => {
    await expect(graph.createOrganization({ key: 'acme', uuid: 'uuid-other', name: 'Other Acme' })).rejects.toMatchObject({
      code: 'VALIDATION.SCHEMA',
    });
  });

  test('rejects a program whose authoring organization does not exist', async () => {
    await expect(
      graph.createProgram({
        key: 'ghost',
        uuid: 'uuid-ghost',
        title: 'Ghost Program',
        programType: ProgramType.Other,
        managingOrganizationId: world.acme.id,
        authoringOrganizationIds: ['org_missing'],
      }),
    ).rejects.toMatchObject({ code: 'VALIDATION.NOT_FOUND', message: 'Organization not found: org_missing' });
  });

  test('adds a co-authoring organization once', async () => {
    await graph.addAuthoringOrganization(world.acmeMba.id, world.initech.id);
    const updated = await graph.addAuthoringOrganization(world.acmeMba.id, world.initech.id);

    expect(updated.authoringOrganizationIds).toEqual([world.acme.id, world.initech.id]);
    expect((await graph.programsAuthoredBy(world.initech.id)).map((p) => p.key).sort()).toEqual([
      'acme-mba',
      'initech-bachelors',
    ]);
  });

  test('locates targets by key', async () => {
    expect(await graph.locate({ kind: 'program', key: 'acme-mba' })).toEqual(programScope(world.acmeMba));
    expect(await graph.locate({ kind: 'organization', key: 'globex' })).toEqual(orgScope(world.globex));
    await expect(graph.locate({ kind: 'program', key: 'nope' })).rejects.toMatchObject({ code: 'VALIDATION.NOT_FOUND' });
  });

  test('locating by id checks existence', async () => {
    await expect(graph.locate({ kind: 'organization', id: 'org_missing' })).rejects.toMatchObject({
      code: 'VALIDATION.NOT_FOUND',
    });
  });

  test('an organization still referenced by programs or grants cannot be removed', async () => {
    await expect(graph.removeOrganization(world.acme.id)).rejects.toMatchObject({ code: 'VALIDATION.SCHEMA' });

    const lonely = await graph.createOrganization({ key: 'lonely', uuid: 'uuid-lonely', name: 'Lonely' });
    await seedGrant(store, 'sub_any', Role.OrganizationReadMetadata, orgScope(lonely));
    await expect(graph.removeOrganization(lonely.id)).rejects.toMatchObject({ code: 'VALIDATION.SCHEMA' });
  });

  test('an unreferenced organization can be removed', async () => {
    const spare = await graph.createOrganization({ key: 'spare', uuid: 'uuid-spare', name: 'Spare' });

    await graph.removeOrganization(spare.id);

    expect(await graph.getOrganization(spare.id)).toBeNull();
  });
});
