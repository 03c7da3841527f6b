import { Primitive } from './primitive';


export interface Vector3 {
    x: number;
    y: number;
    z: number;
}


export interface Vertex extends Vector3 {
    normal?: Vector3;
}


export class Mesh {

    name: string;
    flags: number = 0;
    origin: Vector3 = { x: 0, y: 0, z: 0 };
    // largest absolute vertex component, used as a bounding sphere radius
    radius: number = 0;
    vertices: Vertex[] = [];
    normals: Vector3[] = [];
    primitives: Primitive[] = [];

    constructor(name: string) {
        this.name = name;
    }

    countPrimitives(): Map<Primitive['type'], number> {
        const counts = new Map<Primitive['type'], number>();
        for(const primitive of this.primitives) {
            counts.set(primitive.type, (counts.get(primitive.type) ?? 0) + 1);
        }

        return counts;
    }

}


export interface ModelObjectInfo {
    index: number;
    name: string;
    vertexCount: number;
    normalCount: number;
    primitiveCount: number;
}
