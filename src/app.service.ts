import { Injectable } from "@nestjs/common";

export interface HealthStatus {
  status: "ok";
}

export interface Item {
  id: number;
  name: string;
  description: string;
}

@Injectable()
export class AppService {
  getHealth(): HealthStatus {
    return { status: "ok" };
  }

  getItem(id: number): Item {
    return {
      id,
      name: `Item ${id}`,
      description: `This is item number ${id}`,
    };
  }
}
