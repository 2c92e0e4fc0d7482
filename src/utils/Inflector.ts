const WORD_SEPARATOR = /[\s_-]+/;

/** `missing_template` / `missing-template` / `MissingTemplate` -> `MissingTemplate` */
export const camelize = (value: string): string =>
  value
    .split(WORD_SEPARATOR)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join('');

/** `MissingTemplate` -> `missingTemplate` */
export const variable = (value: string): string => {
  const camel = camelize(value);
  return camel.charAt(0).toLowerCase() + camel.slice(1);
};

/** `missingTemplate` -> `missing_template` */
export const underscore = (value: string): string =>
  value
    .replace(/([a-z\d])([A-Z])/g, '$1_$2')
    .replace(/[\s-]+/g, '_')
    .toLowerCase();

/** `Blog.Posts` -> `['Blog', 'Posts']`, `Posts` -> `[undefined, 'Posts']` */
export const pluginSplit = (name: string): [string | undefined, string] => {
  const dot = name.indexOf('.');
  if (dot === -1) return [undefined, name];

  return [name.slice(0, dot), name.slice(dot + 1)];
};
