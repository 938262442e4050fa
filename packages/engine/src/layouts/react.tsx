/**
 * React Layouts
 *
 * Adapts React components to the Template capability: the component gets the
 * layout context as props and is rendered to static markup.
 */

import type { ComponentType, ReactElement } from "react";
import { renderToStaticMarkup } from "react-dom/server";
import type { LayoutContext, Template } from "./registry.js";

export type LayoutComponent = ComponentType<LayoutContext>;

const DOCTYPE = "<!DOCTYPE html>";

/**
 * Render an element to a complete HTML document
 */
export function renderHtmlDocument(element: ReactElement): string {
  const markup = renderToStaticMarkup(element);
  return markup.startsWith("<!DOCTYPE") ? markup : `${DOCTYPE}${markup}`;
}

/**
 * Wrap a React component as a template
 */
export function reactTemplate(Component: LayoutComponent): Template {
  return (context) => renderHtmlDocument(<Component {...context} />);
}
