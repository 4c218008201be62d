import {
  StackDescriptorSchema,
  type CustomNetwork,
  type StackDescriptor,
} from '@dockyard/shared';
import { ValidationError, type ValidationIssue } from '../../lib/errors.js';
import type { TreeMap } from '../../lib/tree.js';

function attachedNetworks(networks: string[] | Record<string, unknown> | undefined): string[] {
  if (!networks) {
    return [];
  }
  return Array.isArray(networks) ? networks : Object.keys(networks);
}

/**
 * Structural check of an assembled descriptor. Throws a ValidationError
 * listing every issue; returns the typed descriptor otherwise.
 */
export function validateStack(descriptor: TreeMap, customNetworks: readonly CustomNetwork[] = []): StackDescriptor {
  const parsed = StackDescriptorSchema.safeParse(descriptor);
  if (!parsed.success) {
    const issues: ValidationIssue[] = parsed.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ValidationError('Stack descriptor is invalid', issues);
  }

  const stack: StackDescriptor = parsed.data;
  const declared = stack.networks ?? {};
  const issues: ValidationIssue[] = [];

  for (const [serviceName, service] of Object.entries(stack.services)) {
    for (const network of attachedNetworks(service.networks)) {
      if (network !== 'default' && !Object.hasOwn(declared, network)) {
        issues.push({
          path: `services.${serviceName}.networks.${network}`,
          message: `network "${network}" is not declared at top level`,
        });
      }
    }
  }

  for (const network of customNetworks) {
    const definition = declared[network.name];
    if (definition && definition.external === false) {
      issues.push({
        path: `networks.${network.name}`,
        message: `custom network "${network.name}" is declared with external: false`,
      });
    }
  }

  if (issues.length > 0) {
    throw new ValidationError('Stack descriptor is invalid', issues);
  }

  return stack;
}
