/** Descriptor types — shapes enforced by schemas/image.schema.json and module.schema.json. */
export type SchemaType = "image" | "module";

export type NameValue = {
  name: string;
  value: string | number | boolean;
};

export type EnvEntry = {
  name: string;
  value?: string | number | boolean;
  example?: string | number | boolean;
  description?: string;
};

export type PortEntry = {
  value: number;
};

export type ScriptEntry = {
  package: string;
  exec?: string;
  user?: string | number;
};

export type ArtifactEntry = {
  artifact: string;
  name?: string;
  sha256?: string;
  sha1?: string;
  md5?: string;
};

/** Keys shared by image and module descriptors. */
export type DescriptorBody = {
  name: string;
  version?: string | number;
  release?: string | number;
  description?: string;
  maintainer?: string;
  labels?: NameValue[];
  envs?: EnvEntry[];
  ports?: PortEntry[];
  packages?: string[];
  repositories?: string[];
  scripts?: ScriptEntry[];
  user?: string | number;
  workdir?: string;
  cmd?: string[];
  entrypoint?: string[];
  volumes?: string[];
  artifacts?: ArtifactEntry[];
};

export type ModuleDescriptor = DescriptorBody;

export type ImageDescriptor = DescriptorBody & {
  from: string;
  version: string | number;
  modules?: string[];
};

/** Root descriptor after modules are merged in; `user` is always resolved. */
export type EffectiveConfiguration = Omit<ImageDescriptor, "user"> & {
  user: string | number;
};
