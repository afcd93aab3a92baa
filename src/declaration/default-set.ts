import { DEFAULT_REGION } from '../core/const'
import { CORE_VALIDATION_PATTERNS } from '../core/validation/patterns'
import { BOOTSTRAP_SCRIPT } from './bootstrap'
import { param, ref } from './expressions'
import { DeclarationSet } from './types'

export const DEFAULT_AMI_ID = 'ami-0c02fb55956c7d316'
export const DEFAULT_INSTANCE_TYPE = 't2.micro'
export const DEFAULT_INSTANCE_NAME = 'stackplan-web'

const ANYWHERE = ['0.0.0.0/0']

/**
 * Web stack: one security group opening SSH and HTTP, one instance running the bootstrap
 * script, tagged with its name. Outputs the instance public address and id.
 */
export function defaultDeclarationSet(): DeclarationSet {
    return {
        parameters: [
            {
                name: 'region',
                type: 'string',
                default: DEFAULT_REGION,
                description: 'AWS region to deploy into',
                pattern: CORE_VALIDATION_PATTERNS.AWS_REGION,
            },
            {
                name: 'ami_id',
                type: 'string',
                default: DEFAULT_AMI_ID,
                description: 'Machine image of the instance',
                pattern: CORE_VALIDATION_PATTERNS.AMI_ID,
            },
            {
                name: 'instance_type',
                type: 'string',
                default: DEFAULT_INSTANCE_TYPE,
                description: 'Instance size class',
                pattern: CORE_VALIDATION_PATTERNS.INSTANCE_TYPE,
            },
            {
                name: 'instance_name',
                type: 'string',
                default: DEFAULT_INSTANCE_NAME,
                description: 'Name tag of the instance',
                pattern: CORE_VALIDATION_PATTERNS.INSTANCE_NAME,
            },
        ],
        provider: {
            name: 'aws',
            region: param('region'),
        },
        resources: [
            {
                type: 'aws_security_group',
                name: 'web_sg',
                attributes: {
                    name: 'stackplan-web-sg',
                    description: 'Allow SSH and HTTP inbound traffic',
                    ingress: [
                        { description: 'SSH', from_port: 22, to_port: 22, protocol: 'tcp', cidr_blocks: ANYWHERE },
                        { description: 'HTTP', from_port: 80, to_port: 80, protocol: 'tcp', cidr_blocks: ANYWHERE },
                    ],
                    egress: [
                        { from_port: 0, to_port: 0, protocol: '-1', cidr_blocks: ANYWHERE },
                    ],
                },
            },
            {
                type: 'aws_instance',
                name: 'web',
                attributes: {
                    ami: param('ami_id'),
                    instance_type: param('instance_type'),
                    vpc_security_group_ids: [ref('aws_security_group.web_sg', 'id')],
                    user_data: BOOTSTRAP_SCRIPT,
                    tags: {
                        Name: param('instance_name'),
                    },
                },
            },
        ],
        outputs: [
            {
                name: 'instance_public_ip',
                value: ref('aws_instance.web', 'public_ip'),
                description: 'Public IP address of the web instance',
            },
            {
                name: 'instance_id',
                value: ref('aws_instance.web', 'id'),
                description: 'Instance ID',
            },
        ],
    }
}
