/**
 * Every query shape the library synthesizes. Callers only fill the slots; terms are
 * rendered before they get here.
 * Paged dumps are ordered so that OFFSET walks a stable sequence.
 */

export const PAGE_SIZE = 5000;

/** The `GRAPH <uri> {` / `}` pair around patterns, empty for the default graph. */
export type GraphScope = {
  sparqlBegin: string;
  sparqlEnd: string;
};

export type DiscoveryVocabulary = {
  typeProperty: string;
  labelProperty: string;
  commentProperty: string;
};

export function classesQuery(scope: GraphScope, vocab: DiscoveryVocabulary): string {
  return `
    # model.getClasses
    SELECT DISTINCT
      ?uri
      (COALESCE(?label_, '') as ?label)
    WHERE {
      ${scope.sparqlBegin}
        ?subject ${vocab.typeProperty} ?uri .
        OPTIONAL { ?uri ${vocab.labelProperty} ?label_ }
      ${scope.sparqlEnd}
    }
  `;
}

/**
 * Domain is the subject's type; range is the object's type for IRIs and the
 * datatype for literals.
 */
export function propertiesQuery(scope: GraphScope, vocab: DiscoveryVocabulary): string {
  return `
    # model.getProperties
    SELECT DISTINCT
      (COALESCE(?domain_class_uri_, '') as ?domain_class_uri)
      ?uri
      (COALESCE(?label_, '') as ?label)
      ?range_class_uri
    WHERE {
      ${scope.sparqlBegin}
        ?s ?uri ?o .
        OPTIONAL { ?uri ${vocab.labelProperty} ?label_ }
        OPTIONAL { ?s ${vocab.typeProperty} ?domain_class_uri_ . }
        OPTIONAL { ?o ${vocab.typeProperty} ?range_class_uri_ . }
      ${scope.sparqlEnd}

      FILTER (?uri != ${vocab.typeProperty} && ?uri != ${vocab.labelProperty} && ?uri != ${vocab.commentProperty})
      BIND(IF(isIRI(?o), COALESCE(?range_class_uri_, ''), DATATYPE(?o)) as ?range_class_uri)
    }
  `;
}

export function shapeClassesQuery(scope: GraphScope): string {
  return `
    # shacl.getClasses
    SELECT DISTINCT
      ?uri
      (COALESCE(?label_, '') as ?label)
    WHERE {
      ${scope.sparqlBegin}
        ?node a sh:NodeShape .
        ?node sh:targetClass ?uri .
        OPTIONAL { ?node sh:name ?label_ . }
      ${scope.sparqlEnd}
    }
  `;
}

/**
 * With an inverse path (`sh:path [ sh:inversePath p ]`) the target class sits on the
 * object side, so domain and range swap.
 */
export function shapePropertiesQuery(scope: GraphScope): string {
  return `
    # shacl.getProperties
    SELECT DISTINCT
      (COALESCE(?target_class_, '') as ?card_of_class_uri)
      (COALESCE(?label_, ?uri) as ?label)
      (COALESCE(?order_, '') as ?order)
      (COALESCE(?min_count_, '') as ?min_count)
      (COALESCE(?max_count_, '') as ?max_count)
      (COALESCE(?domain_class_uri_, '') as ?domain_class_uri)
      ?uri
      (COALESCE(?range_class_uri_, ?datatype_, '') as ?range_class_uri)
    WHERE {
      ${scope.sparqlBegin}
        ?shape sh:property ?node .
        ?node sh:path ?supposed_uri .
        OPTIONAL { ?shape sh:targetClass ?target_class_ . }
        OPTIONAL { ?supposed_uri sh:inversePath ?inverse_property_uri . }
        OPTIONAL { ?node sh:name ?label_ . }
        OPTIONAL { ?node sh:order ?order_ . }
        OPTIONAL { ?node sh:minCount ?min_count_ . }
        OPTIONAL { ?node sh:maxCount ?max_count_ . }
        OPTIONAL { ?node sh:datatype ?datatype_ . }
        OPTIONAL { ?node sh:class ?class . }

        BIND(IF(isBlank(?supposed_uri), '', ?target_class_) as ?domain_class_uri_)
        BIND(IF(isBlank(?supposed_uri), ?target_class_, ?class) as ?range_class_uri_)
        BIND(IF(isBlank(?supposed_uri), ?inverse_property_uri, ?supposed_uri) as ?uri)
      ${scope.sparqlEnd}
    }
  `;
}

export function graphDumpQuery(scope: GraphScope, offset: number, limit: number = PAGE_SIZE): string {
  return `
    # graph.dump
    SELECT
      ?s ?p ?o
      ?s_is_blank ?o_is_blank
    WHERE {
      ${scope.sparqlBegin}
        ?s ?p ?o .
        BIND(isBlank(?s) as ?s_is_blank)
        BIND(isBlank(?o) as ?o_is_blank)
      ${scope.sparqlEnd}
    }
    ORDER BY ?s ?p ?o
    LIMIT ${limit}
    OFFSET ${offset}
  `;
}

export function namedGraphsQuery(): string {
  return `
    # store.graphs
    SELECT DISTINCT ?g WHERE { GRAPH ?g { ?s ?p ?o . } }
  `;
}

/** `graphTerm` is an already rendered `<uri>`, or null for the default graph. */
export function storeDumpQuery(graphTerm: string | null, offset: number, limit: number = PAGE_SIZE): string {
  const pattern = graphTerm ? `GRAPH ${graphTerm} { ?s ?p ?o . }` : '?s ?p ?o .';
  return `
    # store.dump
    SELECT ?s ?p ?o WHERE { ${pattern} }
    ORDER BY ?s ?p ?o
    LIMIT ${limit}
    OFFSET ${offset}
  `;
}

export function insertDataQuery(scope: GraphScope, triples: readonly string[]): string {
  return `
    # sparql.insert
    INSERT DATA {
      ${scope.sparqlBegin}
        ${triples.join('\n')}
      ${scope.sparqlEnd}
    }
  `;
}

export function deleteDataQuery(scope: GraphScope, triples: readonly string[]): string {
  return `
    # sparql.deleteData
    DELETE DATA {
      ${scope.sparqlBegin}
        ${triples.join('\n')}
      ${scope.sparqlEnd}
    }
  `;
}

export function deleteWhereQuery(scope: GraphScope, triples: readonly string[]): string {
  return `
    # sparql.delete
    DELETE WHERE {
      ${scope.sparqlBegin}
        ${triples.join('\n')}
      ${scope.sparqlEnd}
    }
  `;
}
