import { SchemaModel, CLASS_CLASS, count, resolveClass, text } from './model.js';
import { SH, XSD } from './prefix.js';
import { Property } from './property.js';
import { shapeClassesQuery, shapePropertiesQuery } from './queries.js';
import { Resource } from './resource.js';

/**
 * Reads classes and properties from SHACL shapes instead of inferring them from
 * the data: node shape target classes, and property shapes with their cardinality
 * and order.
 */
export class ShapeModel extends SchemaModel {
  override readonly frameworkName: string = 'SHACL';

  protected override async discoverClasses(): Promise<Resource[]> {
    this.ensurePrefix(SH);
    const rows = await this.select((scope) => shapeClassesQuery(scope));
    const found = rows.map((row) => new Resource(text(row, 'uri'), { label: text(row, 'label'), classUri: CLASS_CLASS }));
    return [...found, ...SchemaModel.valueClasses()];
  }

  protected override async discoverProperties(classes: readonly Resource[]): Promise<Property[]> {
    this.ensurePrefix(SH);
    this.ensurePrefix(XSD);
    const rows = await this.select((scope) => shapePropertiesQuery(scope));
    return rows.map(
      (row) =>
        new Property(text(row, 'uri'), {
          label: text(row, 'label') || text(row, 'uri'),
          domain: resolveClass(classes, text(row, 'domain_class_uri')),
          range: resolveClass(classes, text(row, 'range_class_uri')),
          cardOf: resolveClass(classes, text(row, 'card_of_class_uri')),
          order: count(row, 'order'),
          minCount: count(row, 'min_count'),
          maxCount: count(row, 'max_count')
        })
    );
  }
}
