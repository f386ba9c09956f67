import * as fs from "fs";
import { z } from "zod";
import { getLogger } from "./logger";

const PropertyDetailSchema = z.object({
  Kind: z.string().optional(),
  TypeName: z.string().optional(),
  HumanFriendlyTypeName: z.string().optional(),
  Name: z.string(),
  DocLines: z.array(z.string()).optional(),
  DefaultValue: z.string().nullable().optional(),
  ValidValues: z.array(z.string()).nullable().optional(),
});

const TraitDetailSchema = z.object({
  DefiningAssemblyName: z.string().optional(),
  IsConditional: z.boolean().optional(),
  RequiredTraits: z.array(z.string()).optional(),
  Properties: z.array(PropertyDetailSchema).default([]),
  DocLines: z.array(z.string()).optional(),
  Namespace: z.string().optional(),
  Name: z.string(),
});

export const TypeDataSchema = z.array(TraitDetailSchema);

export type PropertyDetail = z.infer<typeof PropertyDetailSchema>;
export type TraitDetail = z.infer<typeof TraitDetailSchema>;
export type TypeData = z.infer<typeof TypeDataSchema>;

/**
 * Validate parsed JSON as type data.
 * Returns undefined (and logs why) when the shape is wrong.
 */
export function parseTypeData(json: unknown, source = "type data"): TypeData | undefined {
  const result = TypeDataSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    getLogger().warn(`Ignoring ${source}: ${issue?.message ?? "invalid shape"}${where}`);
    return undefined;
  }
  return result.data;
}

/**
 * Load trait documentation from a JSON file.
 * A missing or malformed file leaves hover without trait docs.
 */
export async function loadTypeData(filePath: string): Promise<TypeData | undefined> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, "utf8");
  } catch (err) {
    getLogger().info(`No type data loaded from ${filePath}: ${String(err)}`);
    return undefined;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    getLogger().warn(`Type data at ${filePath} is not valid JSON: ${String(err)}`);
    return undefined;
  }
  return parseTypeData(json, filePath);
}

/** The trait named `name`, ignoring an `@suffix` on either side */
export function findTrait(typeData: TypeData, name: string): TraitDetail | undefined {
  const bare = name.split("@")[0];
  return typeData.find((trait) => trait.Name === name || trait.Name === bare);
}

export function findProperty(trait: TraitDetail, name: string): PropertyDetail | undefined {
  return trait.Properties.find((property) => property.Name === name);
}
