/**
 * 선언형 요소 로케이터.
 * 구조 경로(nth-child, xpath) 대신 텍스트/placeholder/속성/role로 찾는다.
 * 매 조회마다 새로 해석하며 내비게이션을 넘어 캐시하지 않는다.
 */

type Refinements = {
  /** 이 텍스트를 포함하는 요소만 */
  hasText?: string;
  /** 이 텍스트를 포함하는 요소는 제외 */
  excludeText?: string;
  /** 현재 보이는 요소만 */
  visibleOnly?: boolean;
  /** 부모 descriptor 범위 안에서만 찾는다 */
  within?: ElementDescriptor;
};

export type PlaceholderDescriptor = Refinements & {
  kind: 'placeholder';
  value: string;
  exact?: boolean;
};

export type TextDescriptor = Refinements & {
  kind: 'text';
  value: string;
  exact?: boolean;
  /** 지정하면 해당 태그(예: 'button') 중 텍스트를 포함하는 요소 */
  tag?: string;
};

export type AttributeDescriptor = Refinements & {
  kind: 'attribute';
  attribute: string;
  value: string;
  match: 'equals' | 'contains';
  tag?: string;
};

export type RoleDescriptor = Refinements & {
  kind: 'role';
  role: 'button' | 'textbox' | 'option' | 'listbox' | 'dialog' | 'link';
  name?: string;
  exact?: boolean;
};

export type ElementDescriptor =
  | PlaceholderDescriptor
  | TextDescriptor
  | AttributeDescriptor
  | RoleDescriptor;

export type PickPosition = 'first' | 'last' | number;

export type Target = {
  descriptor: ElementDescriptor;
  pick?: PickPosition;
};

export function byPlaceholder(value: string, extra: Omit<PlaceholderDescriptor, 'kind' | 'value'> = {}): PlaceholderDescriptor {
  return { kind: 'placeholder', value, ...extra };
}

export function byText(value: string, extra: Omit<TextDescriptor, 'kind' | 'value'> = {}): TextDescriptor {
  return { kind: 'text', value, ...extra };
}

export function byAttributePattern(
  attribute: string,
  value: string,
  extra: Omit<AttributeDescriptor, 'kind' | 'attribute' | 'value' | 'match'> & { match?: 'equals' | 'contains' } = {},
): AttributeDescriptor {
  return { kind: 'attribute', attribute, value, ...extra, match: extra.match ?? 'contains' };
}

export function byRole(
  role: RoleDescriptor['role'],
  extra: Omit<RoleDescriptor, 'kind' | 'role'> = {},
): RoleDescriptor {
  return { kind: 'role', role, ...extra };
}

export function within<T extends ElementDescriptor>(parent: ElementDescriptor, child: T): T {
  return { ...child, within: parent };
}

export function target(descriptor: ElementDescriptor, pick: PickPosition = 'first'): Target {
  return { descriptor, pick };
}

function describeBase(d: ElementDescriptor): string {
  switch (d.kind) {
    case 'placeholder':
      return `placeholder${d.exact ? '=' : '*='}"${d.value}"`;
    case 'text':
      return `${d.tag ? `${d.tag}:` : ''}text${d.exact ? '=' : '*='}"${d.value}"`;
    case 'attribute':
      return `${d.tag ?? ''}[${d.attribute}${d.match === 'equals' ? '=' : '*='}"${d.value}"]`;
    case 'role':
      return d.name === undefined ? `role=${d.role}` : `role=${d.role}[name${d.exact ? '=' : '*='}"${d.name}"]`;
  }
}

/** 로그/에러 메시지용 사람이 읽을 수 있는 표현 */
export function describeDescriptor(d: ElementDescriptor): string {
  const parts = [describeBase(d)];
  if (d.hasText !== undefined) parts.push(`:has-text("${d.hasText}")`);
  if (d.excludeText !== undefined) parts.push(`:not-text("${d.excludeText}")`);
  if (d.visibleOnly) parts.push(':visible');
  const self = parts.join('');
  return d.within ? `${describeDescriptor(d.within)} >> ${self}` : self;
}

export function describeTarget(t: Target): string {
  const pick = t.pick ?? 'first';
  const suffix = pick === 'first' ? '' : pick === 'last' ? ' (last)' : ` (nth=${pick})`;
  return `${describeDescriptor(t.descriptor)}${suffix}`;
}
