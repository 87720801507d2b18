/**
 * Field declaration tags
 *
 * Grammar: `"-"` or `name[,flag]*` with flags `omitempty` and `ignore`.
 * Unknown flags are skipped. Parsing never fails.
 */

export interface FieldTag {
  /** Wire name; empty means "use the declared identifier" */
  readonly name: string;
  readonly omitIfEmpty: boolean;
  readonly ignore: boolean;
}

export function parseTag(tag: string): FieldTag {
  const trimmed = tag.trim();
  if (trimmed === '-') {
    return { name: '', omitIfEmpty: false, ignore: true };
  }

  const [head = '', ...flags] = trimmed.split(',');
  const name = head.trim();
  let omitIfEmpty = false;
  let ignore = name === '-';

  for (const flag of flags) {
    switch (flag.trim()) {
      case 'omitempty':
        omitIfEmpty = true;
        break;
      case 'ignore':
        ignore = true;
        break;
      default:
        break;
    }
  }

  return { name: name === '-' ? '' : name, omitIfEmpty, ignore };
}
