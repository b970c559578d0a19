import { EntitySpec } from '../types';
import { InvalidArgumentError } from '../shared/errors';

const LEADING_LETTER = /^\p{L}/u;
const IDENTIFIER = /^[\p{L}\p{N}_]*$/u;

/**
 * Derives every name form an entity is ever rendered with.
 *
 * The plural rule is a plain suffix check: a base ending in "s" is taken as
 * already plural ("Status" -> singular "Statu"). No artifact derives names on
 * its own; they all read the EntitySpec returned here.
 */
export function resolveEntityNames(rawName: string): EntitySpec {
  if (rawName.length === 0) {
    throw new InvalidArgumentError('Entity name must not be empty', 'entityName', rawName);
  }
  if (!LEADING_LETTER.test(rawName)) {
    throw new InvalidArgumentError(
      `Entity name must start with a letter: "${rawName}"`,
      'entityName',
      rawName,
    );
  }
  if (!IDENTIFIER.test(rawName)) {
    throw new InvalidArgumentError(
      `Entity name may only contain letters, digits and underscores: "${rawName}"`,
      'entityName',
      rawName,
    );
  }

  const base = capitalize(rawName);
  const alreadyPlural = base.endsWith('s') && base.length > 1;

  const singularName = alreadyPlural ? base.slice(0, -1) : base;
  const pluralName = alreadyPlural ? base : `${base}s`;

  return Object.freeze({
    rawName,
    singularName,
    pluralName,
    camelName: lowerFirst(singularName),
  });
}

export function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function lowerFirst(value: string): string {
  return value.charAt(0).toLowerCase() + value.slice(1);
}
