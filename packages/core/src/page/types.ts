/**
 * A mounted unit of UI. Components are compared by identity.
 */
export type Component = object;

/** Builds a fresh component instance. */
export type ComponentCreator = () => Component;

/**
 * The markup engine a page renders through. Mounting, dismounting and diffing
 * live behind this interface; pages only sequence the calls.
 */
export type Markup = Readonly<{
  mount: (component: Component) => void;
  dismount: (component: Component) => void;
  update: (component: Component) => void;
  contains: (component: Component) => boolean;
}>;

export type MarkupFactory = () => Markup;

export type PageConfig = Readonly<{
  /** URL loaded right after the page is created. */
  defaultUrl?: string;
}>;
