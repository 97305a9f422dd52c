export interface Todo {
  id: number;
  title: string;
  description: string;
  is_done: boolean;
}

// Row shapes returned by the individual endpoints
export type TodoSummary = Pick<Todo, "id" | "title" | "is_done">;
export type TodoDetail = Omit<Todo, "id">;
export type DeletedTodo = Pick<Todo, "title" | "description">;

export type ResponseMessage = "Success" | "Failed";

export interface ApiResponse<T> {
  data: T | null;
  status: number;
  message: ResponseMessage;
}
