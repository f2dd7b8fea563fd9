/** Configuration types — layered config system. */
export type GeneratorToggles = {
  manifest: boolean;
  install_block: boolean;
};

export type TpackConfig = {
  schema_version: string;
  manifest_file: string;
  generator_name: string;
  skip_dirs: string[];
  ignore: string[];
  namespace_prefixes: string[];
  repository_root_marker: string;
  generators: GeneratorToggles;
};

/** Entities provided by the host application itself; never tracked as dependencies. */
export type BuiltinTables = {
  action_namespaces: string[];
  tags: string[];
  modes: string[];
  settings: string[];
  captures: string[];
  lists: string[];
};
