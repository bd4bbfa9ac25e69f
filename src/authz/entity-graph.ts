/**
 * Entity Graph: organizations, programs and the authoring relation.
 *
 * A two-level acyclic lookup: a program points at its authoring
 * organizations; organizations never point back at programs except
 * through the authoring index.
 */

import { v4 as uuid } from 'uuid';
import {
  CreateOrganizationInput,
  CreateProgramInput,
  Organization,
  Program,
  ScopeLocator,
  ScopeRef,
} from '../domain/organization';
import { RegistrarError, notFoundError, validationError } from '../domain/errors';
import { Store } from '../storage/store';

/** The target of an authorization check together with the scopes that apply to it. */
export interface ResolvedTarget {
  target: ScopeRef;
  /** The target itself, followed by each authoring organization for a program. */
  applicableScopes: ScopeRef[];
  /** Present when the target is a program. */
  program?: Program;
}

export class EntityGraph {
  constructor(private store: Store) {}

  async createOrganization(input: CreateOrganizationInput): Promise<Organization> {
    if (await this.store.organizations.getByKey(input.key)) {
      throw new RegistrarError(validationError(`Organization key already in use: ${input.key}`, { key: input.key }));
    }
    return this.store.organizations.create({
      id: `org_${uuid()}`,
      key: input.key,
      uuid: input.uuid,
      name: input.name,
      createdAt: new Date().toISOString(),
    });
  }

  async createProgram(input: CreateProgramInput): Promise<Program> {
    if (await this.store.programs.getByKey(input.key)) {
      throw new RegistrarError(validationError(`Program key already in use: ${input.key}`, { key: input.key }));
    }
    const authoring = [...new Set([input.managingOrganizationId, ...(input.authoringOrganizationIds ?? [])])];
    for (const organizationId of authoring) {
      await this.requireOrganization(organizationId);
    }
    return this.store.programs.create({
      id: `prg_${uuid()}`,
      key: input.key,
      uuid: input.uuid,
      title: input.title,
      programType: input.programType,
      managingOrganizationId: input.managingOrganizationId,
      authoringOrganizationIds: authoring,
      createdAt: new Date().toISOString(),
    });
  }

  /** Add a co-authoring organization to a program. Adding an existing author is a no-op. */
  async addAuthoringOrganization(programId: string, organizationId: string): Promise<Program> {
    const program = await this.requireProgram(programId);
    await this.requireOrganization(organizationId);
    if (program.authoringOrganizationIds.includes(organizationId)) return program;
    const updated = await this.store.programs.update(programId, {
      authoringOrganizationIds: [...program.authoringOrganizationIds, organizationId],
    });
    if (!updated) throw new RegistrarError(notFoundError('Program', programId));
    return updated;
  }

  /** Delete an organization that no program and no grant references. */
  async removeOrganization(organizationId: string): Promise<void> {
    await this.requireOrganization(organizationId);
    const programs = await this.store.programs.listByAuthoringOrganization(organizationId);
    const grants = await this.store.accessGrants.countByScope({ kind: 'organization', id: organizationId });
    if (programs.length > 0 || grants > 0) {
      throw new RegistrarError(
        validationError(`Organization ${organizationId} is still referenced`, {
          programs: programs.map((p) => p.id),
          grants,
        }),
      );
    }
    await this.store.organizations.delete(organizationId);
  }

  async getOrganization(id: string): Promise<Organization | null> {
    return this.store.organizations.getById(id);
  }

  async getProgram(id: string): Promise<Program | null> {
    return this.store.programs.getById(id);
  }

  async programsAuthoredBy(organizationId: string): Promise<Program[]> {
    return this.store.programs.listByAuthoringOrganization(organizationId);
  }

  async requireOrganization(id: string): Promise<Organization> {
    const org = await this.store.organizations.getById(id);
    if (!org) throw new RegistrarError(notFoundError('Organization', id));
    return org;
  }

  async requireProgram(id: string): Promise<Program> {
    const program = await this.store.programs.getById(id);
    if (!program) throw new RegistrarError(notFoundError('Program', id));
    return program;
  }

  /** Resolve an id- or key-addressed target to a ScopeRef. */
  async locate(locator: ScopeLocator): Promise<ScopeRef> {
    if ('id' in locator) {
      await this.resolveTarget(locator);
      return locator;
    }
    if (locator.kind === 'organization') {
      const org = await this.store.organizations.getByKey(locator.key);
      if (!org) throw new RegistrarError(notFoundError('Organization', locator.key));
      return { kind: 'organization', id: org.id };
    }
    const program = await this.store.programs.getByKey(locator.key);
    if (!program) throw new RegistrarError(notFoundError('Program', locator.key));
    return { kind: 'program', id: program.id };
  }

  /** Load the target and list the scopes whose grants apply to it. */
  async resolveTarget(target: ScopeRef): Promise<ResolvedTarget> {
    if (target.kind === 'organization') {
      await this.requireOrganization(target.id);
      return { target, applicableScopes: [target] };
    }
    const program = await this.requireProgram(target.id);
    return {
      target,
      program,
      applicableScopes: [
        target,
        ...program.authoringOrganizationIds.map((id): ScopeRef => ({ kind: 'organization', id })),
      ],
    };
  }
}
