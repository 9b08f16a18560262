import type { z } from 'zod';
import type {
  CapabilityHandler,
  CapabilityContext,
  CapabilityResult,
} from '@taskflow/workflow-spec';

/**
 * ケイパビリティ仕様
 */
export interface CapabilitySpec {
  /** ケイパビリティ名（ユニーク） */
  name: string;

  /** 説明（分解オラクルに提示） */
  description: string;

  /** 分解オラクルに提示する主要ケイパビリティか */
  is_primary?: boolean;

  /** カテゴリ */
  category?: string;
}

/**
 * パラメータ検証結果
 */
export interface ValidationResult {
  success: boolean;
  errors?: unknown[];
}

/**
 * 登録済みケイパビリティ
 */
export class RegisteredCapability {
  constructor(
    public readonly spec: CapabilitySpec,
    private readonly handler: CapabilityHandler,
    private readonly paramsSchema?: z.ZodTypeAny
  ) {}

  /**
   * パラメータ検証
   */
  validateParams(params: unknown): ValidationResult {
    if (!this.paramsSchema) {
      return { success: true };
    }

    const result = this.paramsSchema.safeParse(params);
    if (result.success) {
      return { success: true };
    }

    return {
      success: false,
      errors: result.error.errors,
    };
  }

  /**
   * ケイパビリティ実行
   */
  async execute(
    params: Record<string, unknown>,
    context: CapabilityContext
  ): Promise<CapabilityResult> {
    return this.handler(params, context);
  }
}

/**
 * ケイパビリティレジストリ（名前 → ハンドラー）
 */
export class CapabilityRegistry {
  private capabilities = new Map<string, RegisteredCapability>();

  /**
   * ケイパビリティ登録（同名は上書き）
   */
  register(spec: CapabilitySpec, handler: CapabilityHandler, paramsSchema?: z.ZodTypeAny): this {
    this.capabilities.set(spec.name, new RegisteredCapability(spec, handler, paramsSchema));
    return this;
  }

  /**
   * ケイパビリティ登録解除
   */
  unregister(name: string): boolean {
    return this.capabilities.delete(name);
  }

  /**
   * ケイパビリティ取得
   */
  get(name: string): RegisteredCapability | null {
    return this.capabilities.get(name) ?? null;
  }

  /**
   * ケイパビリティが存在するかチェック
   */
  has(name: string): boolean {
    return this.capabilities.has(name);
  }

  /**
   * 仕様一覧取得
   */
  list(): CapabilitySpec[] {
    return Array.from(this.capabilities.values()).map((c) => c.spec);
  }

  /**
   * ケイパビリティ名一覧取得
   */
  keys(): string[] {
    return Array.from(this.capabilities.keys());
  }

  /**
   * ケイパビリティ数取得
   */
  get size(): number {
    return this.capabilities.size;
  }
}
