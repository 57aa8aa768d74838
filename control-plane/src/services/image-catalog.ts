import { readFile } from "node:fs/promises";
import { stripTransport } from "@atomic-image-manager/executor";
import { z } from "zod";

const variantSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  repositorySuffix: z.string().optional(),
  tag: z.string().min(1),
});

const familySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  base: z.string().min(1),
  variants: z.array(variantSchema).min(1),
});

const catalogSchema = z.object({
  families: z.array(familySchema),
});

export type ImageVariant = z.infer<typeof variantSchema>;
export type ImageFamily = z.infer<typeof familySchema>;

export interface CatalogImage {
  readonly familyId: string;
  readonly variantId: string;
  readonly name: string;
  readonly description: string;
  readonly imageRef: string;
}

export const DEFAULT_CATALOG_URL = new URL(
  "../../config/image-catalog.json",
  import.meta.url,
);

/** Curated images offered to the user; anything else is a custom image. */
export class ImageCatalog {
  constructor(private readonly families: readonly ImageFamily[]) {}

  static async load(file: string | URL = DEFAULT_CATALOG_URL): Promise<ImageCatalog> {
    const raw = await readFile(file, "utf8");
    const parsed = catalogSchema.parse(JSON.parse(raw));
    return new ImageCatalog(parsed.families);
  }

  listFamilies(): readonly ImageFamily[] {
    return this.families;
  }

  listImages(): CatalogImage[] {
    return this.families.flatMap((family) =>
      family.variants.map((variant) => ({
        familyId: family.id,
        variantId: variant.id,
        name: `${family.name} ${variant.name}`,
        description: variant.description,
        imageRef: composeReference(family, variant),
      })),
    );
  }

  buildImageReference(familyId: string, variantId: string): string | null {
    const family = this.families.find((candidate) => candidate.id === familyId);
    const variant = family?.variants.find((candidate) => candidate.id === variantId);
    if (!family || !variant) {
      return null;
    }
    return composeReference(family, variant);
  }

  /** Matches regardless of the transport prefix the caller used. */
  contains(imageRef: string): boolean {
    const wanted = stripTransport(imageRef).remainder;
    return this.listImages().some(
      (image) => stripTransport(image.imageRef).remainder === wanted,
    );
  }
}

function composeReference(family: ImageFamily, variant: ImageVariant): string {
  return `${family.base}${variant.repositorySuffix ?? ""}:${variant.tag}`;
}
