import { z } from "zod";

export const ResourceOrder = z.enum(["declaration", "name"]);

export type ResourceOrder = z.infer<typeof ResourceOrder>;

export const AnalyserConfiguration = z.object({
  "naming.appendVersionToOverriddenName": z
    .boolean()
    .describe(
      `Append the root path version (e.g. '_v1') to names set through 'x-terraform-resource-name'`
    )
    .default(false),
  "resources.order": ResourceOrder.describe(
    `Order of the analysed resources: as the paths are declared in the document, or sorted by resource name`
  ).default("declaration"),
  "schema.maxDepth": z
    .number()
    .int()
    .positive()
    .describe(`Maximum nesting of object and list-of-object properties`)
    .default(16),
  "debug.analysis": z
    .boolean()
    .describe(`Enable debug logging for rejected paths`)
    .default(false),
});

export type AnalyserConfiguration = z.infer<typeof AnalyserConfiguration>;
