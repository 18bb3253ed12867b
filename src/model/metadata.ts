/**
 * Metadata key for constructor parameter @Id annotations
 */
export const PARAM_IDS_METADATA_KEY = Symbol('keystone:param-ids');

/**
 * Metadata key for constructor dependency tokens stored by @Reflected
 */
export const CONSTRUCTOR_TOKENS_METADATA_KEY = Symbol('keystone:constructor-tokens');

/**
 * Metadata key for property injection points stored by @InjectProperty
 */
export const PROPERTY_INJECTIONS_METADATA_KEY = Symbol('keystone:property-injections');

/**
 * Metadata key for the @Singleton scope annotation
 */
export const SCOPE_METADATA_KEY = Symbol('keystone:scope');
