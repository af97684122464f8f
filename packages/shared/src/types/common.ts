/**
 * 通用类型定义
 * 包含整个项目通用的基础类型
 */

/**
 * ID类型 - 使用string
 */
export type ID = string;

/**
 * 基础实体类型 - 包含通用字段
 */
export interface BaseEntity {
  id: ID;
  createdAt: Date;
  updatedAt: Date;
}
