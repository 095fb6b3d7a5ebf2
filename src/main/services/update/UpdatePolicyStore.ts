import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { UpdatePolicy, UpdatePolicyPatch } from '@shared/contracts';

const policySchema = z.object({
  autoCheck: z.boolean().catch(false),
  updatedAt: z.string().datetime().catch(() => new Date().toISOString())
});

// campos invalidos caem no default individualmente; so um documento ilegivel reseta tudo
const policyFileSchema = z.object({
  policy: policySchema.catch(() => createDefaultPolicy())
});

type PolicyFile = z.infer<typeof policyFileSchema>;

/**
 * Preferencia de verificacao automatica no boot. Desligada ate o operador
 * habilitar com /auto on.
 */
export class UpdatePolicyStore {
  private readonly filePath: string;
  private current: UpdatePolicy;

  constructor(baseDir: string) {
    const updatesDir = path.join(baseDir, 'updates');
    fs.mkdirSync(updatesDir, { recursive: true });
    this.filePath = path.join(updatesDir, 'policy.json');
    this.current = this.load();
    this.persist();
  }

  get(): UpdatePolicy {
    return { ...this.current };
  }

  set(patch: UpdatePolicyPatch): UpdatePolicy {
    this.current = {
      autoCheck: patch.autoCheck ?? this.current.autoCheck,
      updatedAt: new Date().toISOString()
    };
    this.persist();
    return this.get();
  }

  private load(): UpdatePolicy {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch {
      return createDefaultPolicy();
    }

    const parsed = policyFileSchema.safeParse(raw);
    return parsed.success ? parsed.data.policy : createDefaultPolicy();
  }

  private persist(): void {
    const file: PolicyFile = { policy: this.current };
    fs.writeFileSync(this.filePath, JSON.stringify(file, null, 2), 'utf-8');
  }
}

function createDefaultPolicy(): UpdatePolicy {
  return { autoCheck: false, updatedAt: new Date().toISOString() };
}
