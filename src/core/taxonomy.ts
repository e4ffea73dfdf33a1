/**
 * pqcscan - Vulnerability Taxonomy
 *
 * Static lookup tables of quantum-vulnerable Go packages and functions.
 */

export type Category = 'elliptic-curve' | 'integer-factorization' | 'key-exchange';

export const CATEGORIES: readonly Category[] = ['elliptic-curve', 'integer-factorization', 'key-exchange'];

export interface CategoryInfo {
  label: string;
  description: string;
  // Post-quantum replacement to suggest in reports
  replacement: string;
}

export const CATEGORY_INFO: Readonly<Record<Category, CategoryInfo>> = {
  'elliptic-curve': {
    label: 'elliptic curve cryptography',
    description: 'Discrete logarithms on elliptic curves are solvable with Shor\'s algorithm',
    replacement: 'crypto/mlkem for key establishment, ML-DSA for signatures',
  },
  'integer-factorization': {
    label: 'integer factorization cryptography',
    description: 'Integer factorization and finite-field discrete logarithms are solvable with Shor\'s algorithm',
    replacement: 'crypto/mlkem for key establishment, ML-DSA for signatures',
  },
  'key-exchange': {
    label: 'key exchange algorithm',
    description: 'Elliptic curve Diffie-Hellman key agreement can be broken by a quantum adversary',
    replacement: 'crypto/mlkem',
  },
};

export interface ModuleEntry {
  path: string;
  category: Category;
}

export interface FunctionEntry {
  module: string;
  name: string;
}

export interface TaxonomyDefinition {
  modules: readonly ModuleEntry[];
  functions: readonly FunctionEntry[];
}

export interface Taxonomy {
  /** Categories `path` is listed under (empty when not listed) */
  classifyImport(path: string): ReadonlySet<Category>;
  /** Whether (path, name) is a listed vulnerable function */
  classifyFunction(path: string, name: string): boolean;
  listModules(): ModuleEntry[];
  listFunctions(): FunctionEntry[];
}

const NO_CATEGORIES: ReadonlySet<Category> = new Set<Category>();

export const DEFAULT_DEFINITION: TaxonomyDefinition = {
  modules: [
    { path: 'crypto/ecdh', category: 'elliptic-curve' },
    { path: 'crypto/ecdsa', category: 'elliptic-curve' },
    { path: 'crypto/ed25519', category: 'elliptic-curve' },
    { path: 'crypto/elliptic', category: 'elliptic-curve' },
    { path: 'crypto/rsa', category: 'integer-factorization' },
    { path: 'crypto/dsa', category: 'integer-factorization' },
    { path: 'crypto/ecdh', category: 'key-exchange' },
  ],
  functions: [
    { module: 'crypto/rsa', name: 'DecryptOAEP' },
    { module: 'crypto/rsa', name: 'DecryptPKCS1v15' },
    { module: 'crypto/rsa', name: 'DecryptPKCS1v15SessionKey' },
    { module: 'crypto/rsa', name: 'EncryptOAEP' },
    { module: 'crypto/rsa', name: 'EncryptPKCS1v15' },
    { module: 'crypto/rsa', name: 'SignPKCS1v15' },
    { module: 'crypto/rsa', name: 'SignPSS' },
    { module: 'crypto/rsa', name: 'VerifyPKCS1v15' },
    { module: 'crypto/rsa', name: 'VerifyPSS' },
    { module: 'crypto/ecdsa', name: 'SignASN1' },
    { module: 'crypto/ecdsa', name: 'VerifyASN1' },
    { module: 'crypto/des', name: 'NewTripleDESCipher' },
    { module: 'crypto/x509', name: 'MarshalPKCS1PrivateKey' },
    { module: 'crypto/x509', name: 'MarshalECPrivateKey' },
    { module: 'crypto/x509', name: 'ParsePKCS1PrivateKey' },
    { module: 'crypto/x509', name: 'ParseECPrivateKey' },
    { module: 'crypto/dsa', name: 'Verify' },
    { module: 'crypto/dsa', name: 'Sign' },
    { module: 'crypto/dsa', name: 'GenerateKey' },
  ],
};

/**
 * Build an immutable taxonomy from a definition.
 * Duplicate entries collapse; a module may appear under several categories.
 */
export function createTaxonomy(definition: TaxonomyDefinition): Taxonomy {
  const modules = new Map<string, Set<Category>>();
  for (const entry of definition.modules) {
    const categories = modules.get(entry.path) ?? new Set<Category>();
    categories.add(entry.category);
    modules.set(entry.path, categories);
  }

  const functions = new Map<string, Set<string>>();
  for (const entry of definition.functions) {
    const names = functions.get(entry.module) ?? new Set<string>();
    names.add(entry.name);
    functions.set(entry.module, names);
  }

  const moduleList = [...modules].flatMap(([path, categories]) =>
    CATEGORIES.filter(category => categories.has(category)).map(category => ({ path, category }))
  );
  const functionList = [...functions].flatMap(([module, names]) =>
    [...names].map(name => ({ module, name }))
  );

  return Object.freeze({
    classifyImport: (path: string): ReadonlySet<Category> => modules.get(path) ?? NO_CATEGORIES,
    classifyFunction: (path: string, name: string): boolean => functions.get(path)?.has(name) ?? false,
    listModules: (): ModuleEntry[] => moduleList.map(entry => ({ ...entry })),
    listFunctions: (): FunctionEntry[] => functionList.map(entry => ({ ...entry })),
  });
}

/**
 * A new taxonomy with extra entries on top of `base`. Entries are only ever
 * added.
 */
export function extendTaxonomy(base: Taxonomy, extra: Partial<TaxonomyDefinition>): Taxonomy {
  return createTaxonomy({
    modules: [...base.listModules(), ...(extra.modules ?? [])],
    functions: [...base.listFunctions(), ...(extra.functions ?? [])],
  });
}

export const DEFAULT_TAXONOMY: Taxonomy = createTaxonomy(DEFAULT_DEFINITION);
