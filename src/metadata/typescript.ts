/**
 * TypeScript metadata provider using ts-morph for AST analysis.
 * Produces TypeInfo records for the schema analyzer.
 */
import {
  Project,
  Node,
  SyntaxKind,
  type SourceFile,
  type ClassDeclaration,
  type Decorator,
  type EnumDeclaration,
  type EnumMember,
  type GetAccessorDeclaration,
  type MethodDeclaration,
  type PropertyDeclaration,
  type SetAccessorDeclaration,
  type Symbol as MorphSymbol,
  type TypeNode,
} from 'ts-morph';
import type {
  DecoratorInfo,
  LiteralValue,
  MemberInfo,
  MemberKind,
  MetadataProvider,
  SourceLocation,
  TypeInfo,
  TypeShape,
} from './types.js';
import { readFile } from '../utils/file-system.js';
import { SystemError, ErrorCodes } from '../utils/errors.js';

type DecoratableMember =
  | PropertyDeclaration
  | GetAccessorDeclaration
  | SetAccessorDeclaration
  | MethodDeclaration;

/**
 * Import bindings of one source file, keyed by local name.
 */
interface ImportBindings {
  named: Map<string, { module: string; name: string }>;
  namespaces: Map<string, string>;
}

export interface TypeScriptMetadataProviderOptions {
  /** Keep source files in memory only (nothing is read from disk) */
  inMemory?: boolean;
}

/**
 * Reads class declarations, their decorators and member types with ts-morph.
 */
export class TypeScriptMetadataProvider implements MetadataProvider {
  private project: Project;

  constructor(options: TypeScriptMetadataProviderOptions = {}) {
    this.project = new Project({
      useInMemoryFileSystem: options.inMemory ?? false,
      compilerOptions: {
        allowJs: false,
        strict: false,
        skipLibCheck: true,
        experimentalDecorators: true,
      },
      skipAddingFilesFromTsConfig: true,
      skipFileDependencyResolution: true,
    });
  }

  /**
   * Add a source file from content. Replaces a file already added at the path.
   */
  addSource(filePath: string, content: string): void {
    this.project.createSourceFile(filePath, content, { overwrite: true });
  }

  /**
   * Read a source file from disk and add it.
   */
  async addFile(filePath: string): Promise<void> {
    let content: string;
    try {
      content = await readFile(filePath);
    } catch (error) {
      throw new SystemError(
        ErrorCodes.SOURCE_LOAD_ERROR,
        `Failed to read source file: ${filePath}`,
        { filePath, error: error instanceof Error ? error.message : String(error) }
      );
    }
    this.addSource(filePath, content);
  }

  getTypes(filePath?: string): TypeInfo[] {
    const sourceFiles = filePath ? [this.getSourceFileOrThrow(filePath)] : this.project.getSourceFiles();
    const types: TypeInfo[] = [];

    for (const sourceFile of sourceFiles) {
      const imports = this.collectImportBindings(sourceFile);
      for (const classDecl of sourceFile.getDescendantsOfKind(SyntaxKind.ClassDeclaration)) {
        types.push(this.readClass(classDecl, imports));
      }
    }

    return types;
  }

  /**
   * Release resources.
   */
  dispose(): void {
    for (const sourceFile of this.project.getSourceFiles()) {
      this.project.removeSourceFile(sourceFile);
    }
  }

  private getSourceFileOrThrow(filePath: string): SourceFile {
    const sourceFile = this.project.getSourceFile(filePath);
    if (!sourceFile) {
      throw new SystemError(
        ErrorCodes.FILE_NOT_FOUND,
        `Source file has not been added: ${filePath}`,
        { filePath }
      );
    }
    return sourceFile;
  }

  private readClass(classDecl: ClassDeclaration, imports: ImportBindings): TypeInfo {
    const name = classDecl.getName() ?? '<anonymous>';
    const filePath = classDecl.getSourceFile().getFilePath();
    const members: MemberInfo[] = [];

    for (const member of classDecl.getMembers()) {
      if (Node.isPropertyDeclaration(member)) {
        members.push(this.readMember(member, 'property', member.getTypeNode(), filePath, name, imports));
      } else if (Node.isGetAccessorDeclaration(member)) {
        members.push(this.readMember(member, 'accessor', member.getReturnTypeNode(), filePath, name, imports));
      } else if (Node.isSetAccessorDeclaration(member)) {
        const typeNode = member.getParameters()[0]?.getTypeNode();
        members.push(this.readMember(member, 'accessor', typeNode, filePath, name, imports));
      } else if (Node.isMethodDeclaration(member)) {
        members.push(this.readMember(member, 'method', undefined, filePath, name, imports));
      }
    }

    return {
      name,
      filePath,
      location: this.getLocation(classDecl.getNameNode() ?? classDecl),
      members,
    };
  }

  private readMember(
    member: DecoratableMember,
    kind: MemberKind,
    typeNode: TypeNode | undefined,
    filePath: string,
    className: string,
    imports: ImportBindings
  ): MemberInfo {
    const name = member.getName();
    return {
      id: `${filePath}#${className}.${name}`,
      name,
      kind,
      // A method's type is its signature, never an enum
      type: kind === 'method'
        ? { kind: 'other', text: member.getType().getText(member) }
        : this.resolveTypeShape(member, typeNode),
      decorators: member.getDecorators().map(d => this.readDecorator(d, imports)),
      location: this.getLocation(member.getNameNode()),
    };
  }

  /**
   * Resolve whether a member is enum-typed, following the written annotation
   * first and the checker's type second.
   */
  private resolveTypeShape(member: DecoratableMember, typeNode: TypeNode | undefined): TypeShape {
    const fromAnnotation = typeNode ? this.findEnumInTypeNode(typeNode) : [];
    const enumDecls = fromAnnotation.length > 0
      ? fromAnnotation
      : this.findEnumDeclarations(member.getType().getSymbol());

    if (enumDecls.length > 0) {
      return {
        kind: 'enum',
        name: enumDecls[0].getName(),
        // Merged enum declarations contribute their members in order
        constants: enumDecls.flatMap(decl => decl.getMembers().map(m => this.getEnumMemberName(m))),
      };
    }

    return { kind: 'other', text: typeNode?.getText() ?? member.getType().getText(member) };
  }

  private findEnumInTypeNode(typeNode: TypeNode): EnumDeclaration[] {
    if (Node.isTypeReference(typeNode)) {
      return this.findEnumDeclarations(typeNode.getTypeName().getSymbol());
    }
    if (Node.isParenthesizedTypeNode(typeNode)) {
      return this.findEnumInTypeNode(typeNode.getTypeNode());
    }
    if (Node.isUnionTypeNode(typeNode)) {
      // `Mode | undefined` and `Mode | null` still name the enum
      const candidates = typeNode.getTypeNodes().filter(n => !this.isNullishTypeNode(n));
      if (candidates.length === 1) {
        return this.findEnumInTypeNode(candidates[0]);
      }
    }
    return [];
  }

  private isNullishTypeNode(typeNode: TypeNode): boolean {
    if (typeNode.getKind() === SyntaxKind.UndefinedKeyword) {
      return true;
    }
    return Node.isLiteralTypeNode(typeNode) && typeNode.getLiteral().getKind() === SyntaxKind.NullKeyword;
  }

  private findEnumDeclarations(symbol: MorphSymbol | undefined): EnumDeclaration[] {
    if (!symbol) {
      return [];
    }
    const target = symbol.isAlias() ? symbol.getAliasedSymbol() ?? symbol : symbol;
    const enumDecls: EnumDeclaration[] = [];
    for (const decl of target.getDeclarations()) {
      if (Node.isEnumDeclaration(decl)) {
        enumDecls.push(decl);
      } else if (Node.isEnumMember(decl)) {
        // Enum-literal type, e.g. `readonly mode = Mode.Start`
        const parent = decl.getParent();
        return Node.isEnumDeclaration(parent) ? this.findEnumDeclarations(parent.getSymbol()) : [];
      }
    }
    return enumDecls;
  }

  private getEnumMemberName(member: EnumMember): string {
    const nameNode = member.getNameNode();
    return Node.isStringLiteral(nameNode) ? nameNode.getLiteralValue() : member.getName();
  }

  private collectImportBindings(sourceFile: SourceFile): ImportBindings {
    const named = new Map<string, { module: string; name: string }>();
    const namespaces = new Map<string, string>();

    for (const imp of sourceFile.getImportDeclarations()) {
      const module = imp.getModuleSpecifierValue();
      for (const spec of imp.getNamedImports()) {
        const local = spec.getAliasNode()?.getText() ?? spec.getName();
        named.set(local, { module, name: spec.getName() });
      }
      const namespaceImport = imp.getNamespaceImport();
      if (namespaceImport) {
        namespaces.set(namespaceImport.getText(), module);
      }
    }

    return { named, namespaces };
  }

  private readDecorator(decorator: Decorator, imports: ImportBindings): DecoratorInfo {
    const call = decorator.getCallExpression();
    const callee = call ? call.getExpression() : decorator.getExpression();
    let name = callee.getText();
    let module: string | null = null;

    if (Node.isIdentifier(callee)) {
      const binding = imports.named.get(callee.getText());
      if (binding) {
        name = binding.name;
        module = binding.module;
      }
    } else if (Node.isPropertyAccessExpression(callee)) {
      // @cl.RequiredArgument(...) through `import * as cl from '...'`
      const target = callee.getExpression();
      name = callee.getName();
      module = Node.isIdentifier(target) ? imports.namespaces.get(target.getText()) ?? null : null;
    }

    return {
      name,
      module,
      arguments: decorator.getArguments().map(arg => this.foldLiteral(arg)),
      location: this.getLocation(decorator),
    };
  }

  /**
   * Fold a decorator argument to a constant, syntactically where possible and
   * through its literal type otherwise (`const POSITION = 0`).
   */
  private foldLiteral(node: Node): LiteralValue {
    if (Node.isNumericLiteral(node) || Node.isStringLiteral(node) || Node.isNoSubstitutionTemplateLiteral(node)) {
      return node.getLiteralValue();
    }
    if (Node.isTrueLiteral(node) || Node.isFalseLiteral(node)) {
      return node.getLiteralValue();
    }
    if (Node.isNullLiteral(node)) {
      return null;
    }
    if (Node.isPrefixUnaryExpression(node) && node.getOperatorToken() === SyntaxKind.MinusToken) {
      const operand = node.getOperand();
      if (Node.isNumericLiteral(operand)) {
        return -operand.getLiteralValue();
      }
    }

    const type = node.getType();
    if (type.isNumberLiteral() || type.isStringLiteral()) {
      const value = type.getLiteralValue();
      if (typeof value === 'number' || typeof value === 'string') {
        return value;
      }
    }
    if (type.isBooleanLiteral()) {
      return type.getText() === 'true';
    }

    return undefined;
  }

  private getLocation(node: Node): SourceLocation {
    const sourceFile = node.getSourceFile();
    const { line, column } = sourceFile.getLineAndColumnAtPos(node.getStart());
    return { file: sourceFile.getFilePath(), line, column };
  }
}
