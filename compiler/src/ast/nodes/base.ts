/** Common fields shared by all AST nodes. */
export interface BaseNode {
  kind: string;
}
