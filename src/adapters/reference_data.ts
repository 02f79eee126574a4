// Flat CRUD over reference collections: branches, roles, users, programs, resources, notifications.
// No lifecycle here; the lifecycle only reads these through the reference validator.
import { NotFoundError, ValidationError } from '../engine/errors.js';
import {
  CreateBranchInput,
  CreateNotificationInput,
  CreateProgramInput,
  CreateResourceInput,
  CreateRoleInput,
  CreateUserInput,
  NotificationFilter,
  ProgramFilter,
  ResourceFilter,
  UserFilter,
  createBranchSchema,
  createNotificationSchema,
  createProgramSchema,
  createResourceSchema,
  createRoleSchema,
  createUserSchema,
  notificationFilterSchema,
  parseInput,
  programFilterSchema,
  resourceFilterSchema,
  userFilterSchema,
} from '../models/schemas.js';
import { DocumentStore } from './document_store.js';

export class ReferenceData {
  constructor(private readonly store: DocumentStore) {}

  async createBranch(input: CreateBranchInput) {
    const b = parseInput(createBranchSchema, input);
    if ((await this.store.find('branch', { code: b.code })).length) {
      throw new ValidationError('code', `branch ${b.code} already exists`);
    }
    const id = await this.store.create('branch', {
      code: b.code,
      name: b.name,
      region: b.region ?? null,
      manager_name: b.manager_name ?? null,
      manager_email: b.manager_email ?? null,
    });
    return { id };
  }

  async listBranches() {
    return this.store.find('branch');
  }

  async createRole(input: CreateRoleInput) {
    const r = parseInput(createRoleSchema, input);
    if ((await this.store.find('role', { name: r.name })).length) {
      throw new ValidationError('name', `role ${r.name} already exists`);
    }
    const id = await this.store.create('role', { name: r.name, description: r.description ?? null });
    return { id };
  }

  async listRoles() {
    return this.store.find('role');
  }

  async createUser(input: CreateUserInput) {
    const u = parseInput(createUserSchema, input);
    if ((await this.store.find('user', { email: u.email })).length) {
      throw new ValidationError('email', `user ${u.email} already exists`);
    }
    await this.assertBranch(u.branch_code);
    const id = await this.store.create('user', {
      full_name: u.full_name,
      email: u.email,
      branch_code: u.branch_code ?? null,
      role: u.role,
      is_active: u.is_active,
    });
    return { id };
  }

  async listUsers(filter: UserFilter = {}) {
    return this.store.find('user', parseInput(userFilterSchema, filter));
  }

  async createProgram(input: CreateProgramInput) {
    const p = parseInput(createProgramSchema, input);
    const id = await this.store.create('program', {
      title: p.title,
      type: p.type,
      objective: p.objective ?? null,
      kpis: p.kpis,
    });
    return { id };
  }

  async listPrograms(filter: ProgramFilter = {}) {
    return this.store.find('program', parseInput(programFilterSchema, filter));
  }

  async createResource(input: CreateResourceInput) {
    const r = parseInput(createResourceSchema, input);
    await this.assertBranch(r.branch_code);
    const id = await this.store.create('resource', {
      name: r.name,
      type: r.type,
      branch_code: r.branch_code ?? null,
      capacity: r.capacity ?? null,
      availability_status: r.availability_status,
    });
    return { id };
  }

  async listResources(filter: ResourceFilter = {}) {
    return this.store.find('resource', parseInput(resourceFilterSchema, filter));
  }

  async createNotification(input: CreateNotificationInput) {
    const n = parseInput(createNotificationSchema, input);
    const id = await this.store.create('notification', {
      user_email: n.user_email ?? null,
      branch_code: n.branch_code ?? null,
      title: n.title,
      message: n.message,
      type: n.type,
      is_read: n.is_read,
    });
    return { id };
  }

  async listNotifications(filter: NotificationFilter = {}) {
    return this.store.find('notification', parseInput(notificationFilterSchema, filter));
  }

  async markNotificationRead(id: string) {
    const outcome = await this.store.updateOne('notification', id, { is_read: true });
    if (outcome === 'not_found') throw new NotFoundError('notification', id);
    return { id, is_read: true };
  }

  private async assertBranch(code: string | null | undefined) {
    if (!code) return;
    if (!(await this.store.find('branch', { code })).length) {
      throw new ValidationError('branch_code', `unknown branch ${code}`);
    }
  }
}
